import { assertEnv, loadInboxConfig, type InboxConfig } from "@/lib/config";
import { SupabaseInboxStore } from "@/lib/messaging/data";
import { createDevSeed, MockInboxStore } from "@/lib/messaging/mock";
import { createInboxClient } from "@/lib/supabase/client";
import { InboxController } from "./controller";

export { InboxController } from "./controller";
export type {
    InboxEventMap,
    InboxNotice,
    InboxState,
    SendResult,
    StartConversationResult,
    StatusUpdateResult,
} from "./controller";
export { formatDaySeparator, formatMessageTime, groupByDay } from "./timeFormat";

/**
 * Build an inbox against Supabase from environment configuration.
 * `accessToken` is the operator's JWT; without it the anon key's RLS applies.
 */
export function createInbox(config: InboxConfig = loadInboxConfig(), accessToken?: string): InboxController {
    const operatorId = assertEnv("INBOX_OPERATOR_ID", config.operatorId);
    const client = createInboxClient(config, accessToken);
    const store = new SupabaseInboxStore(client, config.variant);

    return new InboxController(store, { operatorId, options: config.options });
}

/**
 * Inbox over the in-memory store with the dev seed, for local development.
 * The seed follows `config.variant`.
 */
export function createDevInbox(config: InboxConfig = loadInboxConfig()): InboxController {
    const operatorId = config.operatorId ?? "dev-admin";
    const store = new MockInboxStore(config.variant, createDevSeed(operatorId, config.variant));

    return new InboxController(store, { operatorId, options: config.options });
}
