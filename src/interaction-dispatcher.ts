import * as Discord from "discord.js";

import { colors } from "./common.js";
import { ArgumentParseError } from "./context/arguments.js";
import type { ComponentEvent, SlashInteraction } from "./context/interaction-types.js";
import { SlashContext } from "./context/slash-context.js";
import { critical_error, M } from "./utils/debugging-and-logging.js";
import { TypedEventEmitter } from "./utils/event-emitter.js";
import { RegistryClosedError } from "./waiters/errors.js";
import { InteractionSession } from "./waiters/interaction-session.js";

export type SlashCommand<D> = {
    name: string;
    handler: (ctx: SlashContext<D>) => Promise<void>;
};

export type DispatcherOptions = {
    // ms, applied to waiters registered without their own timeout
    default_waiter_timeout?: number;
};

type dispatcher_events = {
    // a component interaction no pending waiter asked for
    unhandled_component: [ComponentEvent];
};

export function create_error_reply(message: string) {
    return {
        embeds: [new Discord.EmbedBuilder().setColor(colors.red).setDescription(message)],
    };
}

// Runs slash commands in their own sessions and routes component interactions to the waiters of live sessions
export class InteractionDispatcher<D> extends TypedEventEmitter<dispatcher_events> {
    private readonly commands = new Map<string, SlashCommand<D>>();
    // insertion order = session creation order = delivery order
    private readonly sessions = new Set<InteractionSession<ComponentEvent>>();

    constructor(
        private readonly application_id: string,
        private readonly data: D,
        commands: SlashCommand<D>[],
        private readonly options: DispatcherOptions = {},
    ) {
        super();
        for (const command of commands) {
            if (this.commands.has(command.name)) {
                throw new Error(`Duplicate command ${command.name}`);
            }
            this.commands.set(command.name, command);
        }
    }

    get active_sessions() {
        return this.sessions.size;
    }

    attach(client: Discord.Client) {
        client.on("interactionCreate", (interaction: Discord.Interaction) => {
            this.on_interaction(interaction).catch(critical_error);
        });
    }

    private async on_interaction(interaction: Discord.Interaction) {
        if (interaction.isChatInputCommand()) {
            await this.handle_command(interaction);
        } else if (interaction.isMessageComponent()) {
            this.deliver_component(interaction);
        }
    }

    async handle_command(interaction: SlashInteraction) {
        const command = this.commands.get(interaction.commandName);
        if (!command) {
            M.warn(`Received unknown command /${interaction.commandName}`);
            await interaction.reply({
                ...create_error_reply("Unknown command"),
                flags: Discord.MessageFlags.Ephemeral,
            });
            return;
        }
        M.log(`Received slash command /${command.name}`, "From:", interaction.user.id, "Id:", interaction.id);
        const session = new InteractionSession<ComponentEvent>(
            interaction.id,
            closed => {
                this.sessions.delete(closed);
            },
            { default_timeout: this.options.default_waiter_timeout },
        );
        this.sessions.add(session);
        try {
            await session.run(async ({ waiters }) => {
                await command.handler(new SlashContext(this.application_id, this.data, waiters, interaction));
            });
        } catch (e) {
            await this.report_command_error(interaction, command, e);
        }
    }

    private async report_command_error(interaction: SlashInteraction, command: SlashCommand<D>, e: unknown) {
        if (e instanceof RegistryClosedError) {
            // the session was shut down under a running handler, nobody is left to answer
            M.debug(`/${command.name} tried to wait after its session closed`);
            return;
        }
        let message = "An error occurred while executing this command";
        if (e instanceof ArgumentParseError) {
            M.warn(`Bad arguments for /${command.name}:`, e.message);
            message = e.message;
        } else {
            critical_error(e);
        }
        if (interaction.deferred || interaction.replied) {
            await interaction.editReply(create_error_reply(message));
        } else {
            await interaction.reply({ ...create_error_reply(message), flags: Discord.MessageFlags.Ephemeral });
        }
    }

    // Returns true if a waiter consumed the event
    deliver_component(event: ComponentEvent) {
        for (const session of this.sessions) {
            if (session.waiters.deliver(event)) {
                M.debug(`Component ${event.customId} consumed by session ${session.id}`);
                return true;
            }
        }
        this.emit("unhandled_component", event);
        return false;
    }

    // Closes every live session, cancelling their pending waiters
    shutdown() {
        let cancelled = 0;
        for (const session of [...this.sessions]) {
            cancelled += session.close("dispatcher shut down");
        }
        return cancelled;
    }
}
