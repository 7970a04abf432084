export * from "./SeverityFormat";
export * from "./Formatter3164";
export * from "./Formatter5424";
export * from "./SyslogFormatter";
export {resolveFacility} from "./options";
