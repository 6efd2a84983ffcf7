export const KILL_SWITCH_REPLY_INGESTION = "reply_ingestion";
export const ENV_REPLY_INGESTION_DISABLED = "REPLY_INGESTION_DISABLED";

export function isTruthyEnv(value?: string): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function isGlobalReplyIngestionDisabled(
  env: Record<string, string | undefined> = process.env
): boolean {
  return isTruthyEnv(env[ENV_REPLY_INGESTION_DISABLED]);
}
