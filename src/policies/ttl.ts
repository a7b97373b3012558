import type {
  Artifact,
  ArtifactStore,
  ArtifactType,
} from "../artifacts/index.js";

/** TTL constants in seconds */
export const TTL = {
  REQUEST_MESSAGE: 30 * 60, // 30 minutes - unanswered requests
  NOTIFICATION_ARTIFACT: 7 * 24 * 3600, // 7 days
  PERSISTENT: null, // no expiry - audit logs, reports, everything else
} as const;

/** Artifact type → default TTL mapping */
export const ARTIFACT_TYPE_TTL: Readonly<Record<ArtifactType, number | null>> = {
  report: TTL.PERSISTENT,
  recommendation: TTL.PERSISTENT,
  visualization: TTL.PERSISTENT,
  data_export: TTL.PERSISTENT,
  analysis: TTL.PERSISTENT,
  validation: TTL.PERSISTENT,
  notification: TTL.NOTIFICATION_ARTIFACT,
  audit_log: TTL.PERSISTENT,
};

/** Default expires_at (epoch ms) for a new artifact of `type`, if any. */
export function defaultExpiryFor(
  type: ArtifactType,
  now = Date.now(),
): number | undefined {
  const ttl = ARTIFACT_TYPE_TTL[type];
  return ttl === null ? undefined : now + ttl * 1000;
}

/**
 * Store artifact with the expiry policy applied.
 * - Fills expires_at from the type default when the artifact has none
 * - Leaves an explicit expires_at untouched
 */
export async function storeWithExpiryPolicy(
  store: ArtifactStore,
  artifact: Artifact,
  now = Date.now(),
): Promise<string> {
  if (artifact.expires_at === undefined) {
    const expiresAt = defaultExpiryFor(artifact.artifact_type, now);
    if (expiresAt !== undefined) artifact.setExpiresAt(expiresAt);
  }
  return store.storeArtifact(artifact);
}
