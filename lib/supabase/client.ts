import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { assertEnv, type InboxConfig } from "@/lib/config";

// -----------------------------------------------------------------------------
// Supabase client factory
// -----------------------------------------------------------------------------

/**
 * Creates a Supabase client for the operator inbox using the anon key.
 * Session persistence is off; the operator's token is supplied per process
 * and RLS policies decide what the operator can read.
 */
export function createInboxClient(
    config: Pick<InboxConfig, "supabaseUrl" | "supabaseAnonKey">,
    accessToken?: string
): SupabaseClient {
    return createClient(
        assertEnv("SUPABASE_URL", config.supabaseUrl),
        assertEnv("SUPABASE_ANON_KEY", config.supabaseAnonKey),
        {
            auth: {
                autoRefreshToken: false,
                persistSession: false,
            },
            global: accessToken
                ? { headers: { Authorization: `Bearer ${accessToken}` } }
                : undefined,
        }
    );
}
