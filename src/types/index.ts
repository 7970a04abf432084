export * from "./Severity";
export * from "./Facility";
export * from "./LogLevel";
export * from "./LogEntry";
export * from "./Formatter";
export * from "./Sink";
export * from "./StructuredData";
export * from "./Identity";
export * from "./LogFormat";
export * from "./FormatterOptions";
