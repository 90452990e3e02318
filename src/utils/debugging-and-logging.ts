import moment from "moment";
import chalk from "chalk";
import * as Sentry from "@sentry/node";
import { to_string } from "./strings.js";

function get_caller_location() {
    // https://stackoverflow.com/a/53339452/15675011
    const e = new Error();
    if (!e.stack) {
        return "<error>";
    }
    const frame = e.stack.split("\n")[3] ?? "";
    const line_number = frame.split(":").reverse()[1];
    const function_name = frame.trim().split(" ")[1];
    return function_name + ":" + line_number;
}

export class M {
    static get_timestamp() {
        return moment().format("MM.DD.YY HH:mm:ss");
    }
    static log(...args: unknown[]) {
        process.stdout.write(`[${M.get_timestamp()}] [log]   `);
        console.log(...args, `(from: ${get_caller_location()})`);
    }
    static debug(...args: unknown[]) {
        process.stdout.write(`${chalk.gray(`[${M.get_timestamp()}] [debug]`)} `);
        console.log(...args, `(from: ${get_caller_location()})`);
    }
    static info(...args: unknown[]) {
        process.stdout.write(`${chalk.blueBright(`[${M.get_timestamp()}] [info] `)} `);
        console.log(...args, `(from: ${get_caller_location()})`);
    }
    static warn(...args: unknown[]) {
        process.stdout.write(`${chalk.yellowBright(`[${M.get_timestamp()}] [warn] `)} `);
        console.log(...args, `(from: ${get_caller_location()})`);
    }
    static error(...args: unknown[]) {
        process.stdout.write(`${chalk.redBright(`[${M.get_timestamp()}] [error]`)} `);
        console.log(...args);
        console.trace();
    }
}

function report(arg: unknown) {
    if (arg instanceof Error) {
        Sentry.captureException(arg);
    } else {
        Sentry.captureMessage(to_string(arg));
    }
}

// Something went wrong that needs a human to look at it
export function critical_error(arg: unknown) {
    M.error("Critical error occurred:", arg);
    report(arg);
}

export function ignorable_error(arg: unknown) {
    M.error("Ignorable error occurred:", arg);
    report(arg);
}

export function milestone(message: string) {
    M.info(message);
    Sentry.captureMessage(message);
}
