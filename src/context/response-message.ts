import type { Waiter, WaiterOptions, WaiterPredicate } from "../waiters/waiter.js";
import type { ComponentEvent, SentMessage } from "./interaction-types.js";
import type { SlashContext } from "./slash-context.js";

// A response sent through a SlashContext, bound to it for follow-up waits
export class ResponseMessage<D> {
    public readonly id: string;
    public readonly channel_id: string;

    constructor(
        public readonly context: SlashContext<D>,
        message: SentMessage,
    ) {
        this.id = message.id;
        this.channel_id = message.channelId;
    }

    // Waits for a component interaction on this message, optionally narrowed further by a predicate
    wait_component(
        predicate: WaiterPredicate<ComponentEvent> = () => true,
        options: WaiterOptions = {},
    ): Waiter<ComponentEvent> {
        return this.context.wait_component(event => event.message.id === this.id && predicate(event), options);
    }
}
