import * as Discord from "discord.js";

import { MINUTE } from "../common.js";
import type { SlashContext } from "../context/slash-context.js";
import type { SlashCommand } from "../interaction-dispatcher.js";
import { M } from "../utils/debugging-and-logging.js";

export function confirm_custom_id(interaction_id: string, choice: "yes" | "no") {
    return `confirm:${choice}:${interaction_id}`;
}

// /confirm question:<text> - asks the invoking user a yes/no question and reports the answer
export async function confirm(ctx: SlashContext<unknown>) {
    const question = ctx.arguments().optional("question", "string") ?? "Are you sure?";
    await ctx.acknowledge();
    const row = new Discord.ActionRowBuilder<Discord.ButtonBuilder>().addComponents(
        new Discord.ButtonBuilder()
            .setCustomId(confirm_custom_id(ctx.interaction.id, "yes"))
            .setLabel("Yes")
            .setStyle(Discord.ButtonStyle.Success),
        new Discord.ButtonBuilder()
            .setCustomId(confirm_custom_id(ctx.interaction.id, "no"))
            .setLabel("No")
            .setStyle(Discord.ButtonStyle.Danger),
    );
    const message = await ctx.update_response(options => ({ ...options, content: question, components: [row] }));
    const outcome = await message
        .wait_component(event => event.user.id === ctx.interaction.user.id, { timeout: MINUTE })
        .outcome;
    if (outcome.status === "cancelled") {
        M.debug(`Confirmation ${ctx.interaction.id} cancelled: ${outcome.reason}`);
        return;
    }
    if (outcome.status === "matched") {
        const content =
            outcome.event.customId === confirm_custom_id(ctx.interaction.id, "yes")
                ? `${question} - confirmed`
                : `${question} - declined`;
        // answers the click and edits the prompt in one request
        await outcome.event.update({ content, components: [] });
    } else {
        await ctx.update_response(options => ({ ...options, content: `${question} - no answer`, components: [] }));
    }
}

export const confirm_command: SlashCommand<unknown> = {
    name: "confirm",
    handler: confirm,
};
