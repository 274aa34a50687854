/**
 * Structural subset of the pino logger Fastify exposes as `server.log`.
 */
export interface Logger {
    debug(obj: unknown, msg?: string): void;
    info(obj: unknown, msg?: string): void;
    warn(obj: unknown, msg?: string): void;
    error(obj: unknown, msg?: string): void;
}
