export interface TimingResult {
    label: string;
    durationMs: number;
}

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

/**
 * Process-wide logger. Everything goes to stderr: stdout carries JSON output
 * and the MCP stdio transport.
 */
class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private debugEnabled: boolean = false;
    private silent: boolean = false;

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setDebugEnabled(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    /**
     * Suppress all log lines (tests, embedding)
     */
    public setSilent(silent: boolean): void {
        this.silent = silent;
    }

    public log(message: string): void {
        this.write("INFO", message);
    }

    public warn(message: string): void {
        this.write("WARN", message);
    }

    public error(message: string): void {
        this.write("ERROR", message);
    }

    public debug(message: string): void {
        if (this.debugEnabled) {
            this.write("DEBUG", message);
        }
    }

    private write(level: LogLevel, message: string): void {
        if (this.silent) return;
        console.error(`[${new Date().toISOString()}] [${level}] ${message}`);
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
        this.timings.push({ label, durationMs: performance.now() - start });
        return result;
    }

    /**
     * Time an async function and record the result
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = await fn();
        this.timings.push({ label, durationMs: performance.now() - start });
        return result;
    }

    /**
     * Print timing summary, grouped by label
     */
    public printTimings(): void {
        if (this.silent) return;
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        const byLabel = new Map<string, { total: number; calls: number }>();
        for (const t of this.timings) {
            const entry = byLabel.get(t.label) ?? { total: 0, calls: 0 };
            entry.total += t.durationMs;
            entry.calls++;
            byLabel.set(t.label, entry);
        }
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        console.error("\n[TIMING] === Performance Summary ===");
        for (const [label, { total: ms, calls }] of byLabel) {
            const pct = total > 0 ? ((ms / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${`${label} (x${calls})`.padEnd(36)} ${ms.toFixed(2).padStart(9)}ms (${pct.padStart(5)}%)`);
        }
        console.error(`[TIMING] ${"TOTAL".padEnd(36)} ${total.toFixed(2).padStart(9)}ms`);
        console.error("[TIMING] ================================\n");
    }
}

export default Logger;
