import * as Discord from "discord.js";

// The subset of a discord.js CommandInteractionOption that argument parsing reads
export type CommandOptionLike = {
    readonly name: string;
    readonly type: Discord.ApplicationCommandOptionType;
    readonly value?: string | number | boolean;
};

export type ArgumentKind = "string" | "integer" | "number" | "boolean" | "user";

export type ArgumentValue<K extends ArgumentKind> = K extends "string" | "user"
    ? string
    : K extends "integer" | "number"
      ? number
      : boolean;

export type ArgumentParseFailure = "missing" | "type_mismatch" | "invalid";

export class ArgumentParseError extends Error {
    constructor(
        public readonly argument: string,
        public readonly reason: ArgumentParseFailure,
        message: string,
    ) {
        super(message);
        this.name = "ArgumentParseError";
    }
}

const option_types: Record<ArgumentKind, Discord.ApplicationCommandOptionType> = {
    string: Discord.ApplicationCommandOptionType.String,
    integer: Discord.ApplicationCommandOptionType.Integer,
    number: Discord.ApplicationCommandOptionType.Number,
    boolean: Discord.ApplicationCommandOptionType.Boolean,
    user: Discord.ApplicationCommandOptionType.User,
};

const snowflake_re = /^\d{17,20}$/;

function convert<K extends ArgumentKind>(kind: K, value: string | number | boolean): ArgumentValue<K> | null;
function convert(kind: ArgumentKind, value: string | number | boolean): string | number | boolean | null {
    switch (kind) {
        case "string":
            return typeof value === "string" ? value : null;
        case "user":
            return typeof value === "string" && snowflake_re.test(value) ? value : null;
        case "integer":
            return typeof value === "number" && Number.isSafeInteger(value) ? value : null;
        case "number":
            return typeof value === "number" && Number.isFinite(value) ? value : null;
        case "boolean":
            return typeof value === "boolean" ? value : null;
    }
}

// Typed access to the options of a chat input command
export class ArgumentReader {
    constructor(private readonly options: readonly CommandOptionLike[]) {}

    has(name: string) {
        return this.options.some(option => option.name === name);
    }

    required<K extends ArgumentKind>(name: string, kind: K): ArgumentValue<K> {
        const value = this.optional(name, kind);
        if (value === null) {
            throw new ArgumentParseError(name, "missing", `Missing required argument "${name}"`);
        }
        return value;
    }

    optional<K extends ArgumentKind>(name: string, kind: K): ArgumentValue<K> | null {
        const option = this.options.find(option => option.name === name);
        if (option === undefined || option.value === undefined) {
            return null;
        }
        if (option.type !== option_types[kind]) {
            throw new ArgumentParseError(
                name,
                "type_mismatch",
                `Argument "${name}" has option type ${option.type}, expected ${kind}`,
            );
        }
        const value = convert(kind, option.value);
        if (value === null) {
            throw new ArgumentParseError(name, "invalid", `Argument "${name}" is not a valid ${kind}`);
        }
        return value;
    }
}
