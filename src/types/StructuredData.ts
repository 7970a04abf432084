export type SDParams = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/**
 * RFC 5424 structured data: SD-ID to (param name to value).
 */
export type StructuredData = Readonly<Record<string, SDParams>> | ReadonlyMap<string, SDParams>;
