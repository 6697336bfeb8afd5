export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface TimingResult {
    label: string;
    durationMs: number;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private level: LogLevel = "info";

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLevel(): LogLevel {
        return this.level;
    }

    private enabled(level: Exclude<LogLevel, "silent">): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    public log(message: string): void {
        if (this.enabled("info")) {
            console.log(`[${new Date().toISOString()}] [INFO] ${message}`);
        }
    }

    public warn(message: string): void {
        if (this.enabled("warn")) {
            console.error(`[${new Date().toISOString()}] [WARN] ${message}`);
        }
    }

    public error(message: string): void {
        if (this.enabled("error")) {
            console.error(`[${new Date().toISOString()}] [ERROR] ${message}`);
        }
    }

    public debug(message: string): void {
        if (this.enabled("debug")) {
            console.error(`[${new Date().toISOString()}] [DEBUG] ${message}`);
        }
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Time a synchronous function and record the result
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = fn();
        const durationMs = performance.now() - start;
        this.timings.push({ label, durationMs });
        return result;
    }

    /**
     * Get all recorded timings
     */
    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    public clearTimings(): void {
        this.timings = [];
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        console.error("\n[TIMING] === Performance Summary ===");
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of this.timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${timing.label.padEnd(30)} ${timing.durationMs.toFixed(2).padStart(8)}ms (${pct.padStart(5)}%)`);
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(30)} ${total.toFixed(2).padStart(8)}ms`);
        console.error("[TIMING] ================================\n");
    }
}

export default Logger;
