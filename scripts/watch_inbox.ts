import fs from "fs";
import path from "path";
import { loadInboxConfig } from "@/lib/config";
import { createDevInbox, createInbox, formatMessageTime, type InboxController } from "@/lib/inbox";

// Operator console: loads the inbox, prints every engine event and stays
// subscribed until Ctrl+C.
//
//   npm run inbox:watch               # Supabase, from .env.local / environment
//   npm run inbox:watch -- --mock     # in-memory dev seed

function readEnvFile(file: string): Record<string, string> {
    const env: Record<string, string> = {};
    let content = "";
    try {
        content = fs.readFileSync(file, "utf-8");
    } catch {
        return env;
    }

    content.split("\n").forEach((line) => {
        const match = line.match(/^([^#=]+)=(.*)$/);
        if (match) {
            const key = match[1].trim();
            env[key] = match[2].trim().replace(/^['"]|['"]$/g, "");
        }
    });
    return env;
}

function attach(inbox: InboxController): void {
    inbox.on("conversations-loaded", ({ conversations, error }) => {
        if (error) {
            console.error(`Load failed (${error.kind}): ${error.message}`);
            return;
        }
        console.log(`${conversations.length} conversation(s), ${inbox.totalUnread()} unread`);
        for (const c of conversations) {
            const status = c.status ? `[${c.status}] ` : "";
            const badge = c.unread_count > 0 ? ` (${c.unread_count})` : "";
            console.log(`  ${status}${c.peer.name}${badge}: ${c.last_message}  ${formatMessageTime(c.last_message_time)}`);
        }
    });

    inbox.on("message-received", ({ message }) => {
        console.log(`> ${message.sender_id}: ${message.text}`);
    });

    inbox.on("conversation-status-changed", ({ id, status }) => {
        console.log(`Conversation ${id} is now ${status}`);
    });

    inbox.on("notice", (notice) => {
        console.log(`! ${notice.message}`);
    });

    inbox.on("subscription-failed", ({ channel, error }) => {
        console.error(`Realtime ${channel} channel gave up: ${error.message}`);
    });
}

async function run() {
    const useMock = process.argv.includes("--mock");
    const env = { ...readEnvFile(path.resolve(process.cwd(), ".env.local")), ...process.env };
    const config = loadInboxConfig(env);

    const inbox = useMock ? createDevInbox(config) : createInbox(config);
    attach(inbox);

    console.log(`Watching ${config.variant} inbox${useMock ? " (mock store)" : ""}...`);
    await inbox.start();

    process.on("SIGINT", () => {
        console.log("\nUnsubscribing...");
        inbox.dispose()
            .then(() => process.exit(0))
            .catch((err: unknown) => {
                console.error(err);
                process.exit(1);
            });
    });
}

run().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
});
