import {MAX_MESSAGE_ID_LENGTH, NILVALUE} from "../constants";

/** PRINTUSASCII per RFC 5424: code points 33 through 126. */
export function isPrintableAscii(char: string): boolean {
    const code = char.codePointAt(0);
    return code !== undefined && code >= 33 && code <= 126;
}

/**
 * Normalizes a MSGID. Numbers are written in decimal, a missing id becomes
 * NILVALUE, and anything outside PRINTUSASCII is dropped before the result is
 * cut to 32 characters.
 */
export function normalizeMessageId(messageId?: string | number | null): string {
    if (typeof messageId === 'number') {
        return normalizeMessageId(String(messageId));
    }
    if (messageId == null) {
        return NILVALUE;
    }

    let normalized = '';
    let length = 0;
    for (const char of messageId) {
        if (length === MAX_MESSAGE_ID_LENGTH) break;
        if (!isPrintableAscii(char)) continue;
        normalized += char;
        length++;
    }
    return normalized;
}
