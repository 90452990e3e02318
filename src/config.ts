import fs from "fs";
import JSONC, { type ParseError } from "jsonc-parser";

import { MAX_TIMEOUT } from "./utils/node.js";

export type bot_config = {
    token: string;
    application_id: string;
    sentry?: string;
    // ms
    default_waiter_timeout?: number;
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function is_record(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function required_string(raw: Record<string, unknown>, key: string) {
    const value = raw[key];
    if (typeof value !== "string" || value.length === 0) {
        throw new ConfigError(`Config field "${key}" must be a non-empty string`);
    }
    return value;
}

export function parse_config(text: string): bot_config {
    const errors: ParseError[] = [];
    const raw: unknown = JSONC.parse(text, errors, { allowTrailingComma: true });
    if (errors.length > 0) {
        const first = errors[0];
        throw new ConfigError(`Malformed config: ${JSONC.printParseErrorCode(first.error)} at offset ${first.offset}`);
    }
    if (!is_record(raw)) {
        throw new ConfigError("Config must be an object");
    }
    const config: bot_config = {
        token: required_string(raw, "token"),
        application_id: required_string(raw, "application_id"),
    };
    if (raw.sentry !== undefined) {
        if (typeof raw.sentry !== "string") {
            throw new ConfigError(`Config field "sentry" must be a string`);
        }
        config.sentry = raw.sentry;
    }
    if (raw.default_waiter_timeout !== undefined) {
        const timeout = raw.default_waiter_timeout;
        if (typeof timeout !== "number" || !Number.isInteger(timeout) || timeout <= 0 || timeout > MAX_TIMEOUT) {
            throw new ConfigError(
                `Config field "default_waiter_timeout" must be a positive integer no greater than ${MAX_TIMEOUT}`,
            );
        }
        config.default_waiter_timeout = timeout;
    }
    return config;
}

// reading sync is okay here, nothing else can happen before the config is loaded
export function load_config(path: string) {
    return parse_config(fs.readFileSync(path, { encoding: "utf-8" }));
}
