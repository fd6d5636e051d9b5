export type LogSink = (msg: string) => void;

let sink: LogSink | undefined;

/**
 * Route diagnostic lines somewhere, e.g. `setLogger(console.log)`.
 * Pass `undefined` to go quiet again, which is the default.
 */
export function setLogger(logger: LogSink | undefined) {
    sink = logger;
}

export function log(msg: string) {
    sink?.(msg);
}

export function getLoggableItem(item: unknown): string {
    if(typeof item === 'string') return JSON.stringify(item);
    if(typeof item === 'object' && item !== null) {
        return item.constructor?.name ? `[${item.constructor.name}]` : '[object]';
    }
    return String(item);
}
