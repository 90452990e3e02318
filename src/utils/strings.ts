export function is_string(arg: unknown): arg is string {
    return typeof arg === "string" || arg instanceof String;
}

export function to_string(arg: unknown): string {
    if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
    } else if (is_string(arg)) {
        return arg.toString();
    } else {
        try {
            return JSON.stringify(arg) ?? String(arg);
        } catch {
            return String(arg);
        }
    }
}
