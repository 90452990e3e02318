import * as Discord from "discord.js";
import * as Sentry from "@sentry/node";

import { critical_error, M, milestone } from "./utils/debugging-and-logging.js";
import { load_config } from "./config.js";
import { InteractionDispatcher } from "./interaction-dispatcher.js";
import { confirm_command } from "./commands/confirm.js";

async function main() {
    M.info("Starting");
    M.info(`Node version: ${process.versions.node}`);

    const config = load_config(process.env.CONFIG_PATH ?? "config.jsonc");

    if (config.sentry) {
        Sentry.init({
            dsn: config.sentry,
        });
    }

    const client = new Discord.Client({
        intents: [Discord.GatewayIntentBits.Guilds],
    });

    const dispatcher = new InteractionDispatcher<unknown>(config.application_id, {}, [confirm_command], {
        default_waiter_timeout: config.default_waiter_timeout,
    });
    dispatcher.attach(client);
    dispatcher.on("unhandled_component", event => {
        M.debug(`Unhandled component interaction ${event.customId} from ${event.user.id}`);
        // nothing else handles components here, answer so the click doesn't show as failed
        event.deferUpdate().catch(critical_error);
    });

    client.on("ready", () => {
        milestone(`Logged in as ${client.user?.tag}`);
    });

    const shutdown = (signal: string) => {
        M.info(`Received ${signal}, shutting down`);
        const cancelled = dispatcher.shutdown();
        M.info(`Cancelled ${cancelled} pending waiter(s)`);
        client
            .destroy()
            .then(() => process.exit(0))
            .catch(e => {
                M.error(e);
                process.exit(1);
            });
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));

    await client.login(config.token);
}

(async () => {
    return main();
})().catch(M.error);

process.on("uncaughtException", error => {
    M.error("uncaughtException", error);
    process.exit(1);
});

// Last line of defense
process.on("unhandledRejection", (reason, promise) => {
    M.error(`unhandledRejection ${reason} ${promise}`);
});
