export * from "./priority";
export * from "./messageId";
export * from "./structuredData";
export * from "./timestamp";
