import * as Discord from "discord.js";

import { M } from "../utils/debugging-and-logging.js";
import type { Waiter, WaiterOptions, WaiterPredicate } from "../waiters/waiter.js";
import type { WaiterRegistry } from "../waiters/waiter-registry.js";
import { ArgumentReader } from "./arguments.js";
import { InteractionRequestError } from "./errors.js";
import type { ComponentEvent, SentMessage, SlashInteraction } from "./interaction-types.js";
import { ResponseMessage } from "./response-message.js";

export type AcknowledgeOptions = {
    // default: false
    ephemeral?: boolean;
};

/**
 * Handed to every slash command handler. Wraps the interaction being processed and the waiter registry of the
 * session it runs in; `data` is whatever the dispatcher was constructed with and is shared by all commands.
 */
export class SlashContext<D> {
    constructor(
        public readonly application_id: string,
        public readonly data: D,
        private readonly waiters: WaiterRegistry<ComponentEvent>,
        public readonly interaction: SlashInteraction,
    ) {}

    // Shares the registry and data, so waiters registered through the copy are torn down with the session
    clone(): SlashContext<D> {
        return new SlashContext(this.application_id, this.data, this.waiters, this.interaction);
    }

    arguments() {
        return new ArgumentReader(this.interaction.options.data);
    }

    /**
     * Responds with a deferred message so the command can take its time. The response must then be filled in with
     * update_response.
     */
    async acknowledge(options: AcknowledgeOptions = {}): Promise<void> {
        M.debug(`Acknowledging /${this.interaction.commandName} (${this.interaction.id})`);
        try {
            await this.interaction.deferReply(options.ephemeral ? { flags: Discord.MessageFlags.Ephemeral } : {});
        } catch (e) {
            throw new InteractionRequestError("acknowledge", e);
        }
    }

    // Edits the original response. `build` receives empty edit options and returns the edit to send.
    async update_response(
        build: (options: Discord.InteractionEditReplyOptions) => Discord.InteractionEditReplyOptions,
    ): Promise<ResponseMessage<D>> {
        const edit = build({});
        let message: SentMessage;
        try {
            message = await this.interaction.editReply(edit);
        } catch (e) {
            throw new InteractionRequestError("update_response", e);
        }
        return new ResponseMessage(this, message);
    }

    // Waits for a component interaction which satisfies the given predicate
    wait_component(predicate: WaiterPredicate<ComponentEvent>, options: WaiterOptions = {}): Waiter<ComponentEvent> {
        return this.waiters.register(predicate, options);
    }
}
