import { M } from "./debugging-and-logging.js";

// setTimeout fires after 1ms when given anything larger
export const MAX_TIMEOUT = 2 ** 31 - 1;

const DEBUG_TIMEOUTS = process.env.DEBUG_TIMEOUTS === "1";

export function set_timeout<Args extends unknown[]>(
    callback: (...args: Args) => void,
    ms?: number,
    ...args: Args
): NodeJS.Timeout {
    if (DEBUG_TIMEOUTS) {
        M.debug("set_timeout", ms);
    }
    return setTimeout(callback, ms, ...args);
}

export function clear_timeout(id: NodeJS.Timeout | string | number | undefined) {
    if (DEBUG_TIMEOUTS) {
        M.debug("clear_timeout", id);
    }
    clearTimeout(id);
}
