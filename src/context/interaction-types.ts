import type * as Discord from "discord.js";

import type { CommandOptionLike } from "./arguments.js";

// Structural views of the discord.js objects the framework touches. Discord.ChatInputCommandInteraction and
// Discord.MessageComponentInteraction satisfy these as they are.

export type SentMessage = {
    readonly id: string;
    readonly channelId: string;
};

export interface SlashInteraction {
    readonly id: string;
    readonly token: string;
    readonly commandName: string;
    readonly user: { readonly id: string };
    readonly options: { readonly data: readonly CommandOptionLike[] };
    readonly deferred: boolean;
    readonly replied: boolean;
    deferReply(options?: Discord.InteractionDeferReplyOptions): Promise<unknown>;
    reply(options: Discord.InteractionReplyOptions): Promise<unknown>;
    editReply(options: Discord.InteractionEditReplyOptions): Promise<SentMessage>;
}

export interface ComponentEvent {
    readonly id: string;
    readonly customId: string;
    readonly user: { readonly id: string };
    readonly message: { readonly id: string };
    // every component interaction has to be answered with one of these, or the user sees "This interaction failed"
    deferUpdate(): Promise<unknown>;
    update(options: Discord.InteractionUpdateOptions): Promise<unknown>;
}
