export * from "./StringSink";
export * from "./ConsoleSink";
export * from "./FdSink";
