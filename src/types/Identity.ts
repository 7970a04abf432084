export interface Identity {
    hostname?: string;
    process: string;
    pid: number;
}
