/**
 * Supabase client for the optional run-history mirror.
 *
 * Returns null when SUPABASE_URL or SUPABASE_ANON_KEY are not configured
 * so callers can skip Supabase-dependent logic.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { Settings } from "../config/settings.ts";

export function createSupabaseClient(config: Settings["supabase"]): SupabaseClient | null {
  if (!config) {
    console.log("[supabase] Not configured; run history stays in the local run log only");
    return null;
  }
  return createClient(config.url, config.anonKey, {
    auth: { persistSession: false },
  });
}
