import {Facility} from "./types";

/** RFC 5424 NILVALUE, used when a field has no value. */
export const NILVALUE = '-';

export const MAX_MESSAGE_ID_LENGTH = 32;

/** SD-NAME (SD-ID and PARAM-NAME) length limit. */
export const MAX_SD_NAME_LENGTH = 32;

export const DEFAULT_FACILITY = Facility.USER;

/** RFC 5424 HOSTNAME when none is known. RFC 3164 omits the field instead. */
export const FALLBACK_HOSTNAME = 'localhost';

export const SYSLOG_VERSION = 1;

/** SD-ID under which {@link SyslogFormatter} places entry metadata (RFC 5612 documentation PEN). */
export const DEFAULT_SD_ID = 'meta@32473';
