/**
 * Utility for pipeline logging.
 * Debug output is enabled via the DEBUG_PARSING environment variable.
 */
export class PipelineLogger {
    private static silent = false;

    private static isDebugEnabled(): boolean {
        return process.env.DEBUG_PARSING === 'true';
    }

    /**
     * Suppress all output (used by tests and batch tools).
     */
    public static setSilent(silent: boolean): void {
        this.silent = silent;
    }

    public static info(tag: string, message: string): void {
        if (this.silent) return;
        console.log(`📄 [${tag}] ${message}`);
    }

    public static warn(tag: string, message: string): void {
        if (this.silent) return;
        console.warn(`⚠️ [${tag}] ${message}`);
    }

    public static error(tag: string, message: string, error?: unknown): void {
        if (this.silent) return;
        if (error === undefined) {
            console.error(`❌ [${tag}] ${message}`);
        } else {
            console.error(`❌ [${tag}] ${message}`, error instanceof Error ? error.message : error);
        }
    }

    /**
     * Logs a message only if parsing debug is enabled.
     * @param data Optional metadata, serialized as JSON
     */
    public static debug(tag: string, message: string, data?: unknown): void {
        if (this.silent || !this.isDebugEnabled()) return;
        const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
        const dataStr = data === undefined ? '' : ` | ${JSON.stringify(data)}`;
        console.log(`🔍 [${timestamp}][${tag}] ${message}${dataStr}`);
    }
}
