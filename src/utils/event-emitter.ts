// Very minimal interface and implementation for a typed EventEmitter
export class TypedEventEmitter<EventMap extends { [x: string]: unknown[] }> {
    private listeners: {
        [E in keyof EventMap]?: ((...args: EventMap[E]) => void)[];
    } = {};

    on<E extends keyof EventMap>(event: E, listener: (...args: EventMap[E]) => void) {
        const listeners = this.listeners[event] ?? [];
        listeners.push(listener);
        this.listeners[event] = listeners;
    }

    off<E extends keyof EventMap>(event: E, listener: (...args: EventMap[E]) => void) {
        const listeners = this.listeners[event];
        if (listeners) {
            this.listeners[event] = listeners.filter(callback => callback !== listener);
        }
    }

    emit<E extends keyof EventMap>(event: E, ...args: EventMap[E]) {
        const listeners = this.listeners[event];
        if (listeners) {
            for (const listener of listeners) {
                listener(...args);
            }
        }
    }
}
