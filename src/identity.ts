import {hostname} from "os";
import {basename} from "path";
import {Identity} from "./types";

/**
 * The parts of the running process that identity detection reads.
 */
export interface IdentityProbe {
    env: NodeJS.ProcessEnv;
    hostname(): string;
    argv: readonly string[];
    execPath: string;
    pid: number;
}

export function nodeProbe(): IdentityProbe {
    return {
        env: process.env,
        hostname,
        argv: process.argv,
        execPath: process.execPath,
        pid: process.pid,
    };
}

/**
 * Best-effort hostname, process name and pid. Nothing here throws: a failed
 * hostname lookup leaves the hostname unset, and a process name that cannot be
 * determined is an empty string.
 */
export function detectIdentity(
    probe: IdentityProbe = nodeProbe(),
    binding: Pick<typeof console, 'warn'> = console
): Identity {
    return {
        hostname: detectHostname(probe, binding),
        process: detectProcessName(probe),
        pid: probe.pid,
    };
}

function detectHostname(probe: IdentityProbe, binding: Pick<typeof console, 'warn'>): string | undefined {
    const fromEnv = probe.env.HOSTNAME?.trim();
    if (fromEnv) return fromEnv;

    try {
        return probe.hostname().trim() || undefined;
    } catch (error) {
        binding.warn('Syslog identity: hostname lookup failed:', error);
        return undefined;
    }
}

function detectProcessName(probe: IdentityProbe): string {
    const script = probe.argv[1];
    if (script) return basename(script);
    return probe.execPath ? basename(probe.execPath) : '';
}
