/**
 * Usable-peer policies.
 *
 * Decide which peers gossip may pick as targets. The default treats a
 * peer as usable when it is healthy, when its health is unknown but it
 * was seen recently, or when no health was ever recorded for it. The
 * last two cases can hide a failed peer, so the rule is a named policy
 * that embedders can replace.
 */

/** Health of a peer as last observed. */
export type PeerHealth = "unknown" | "healthy" | "unhealthy";

/** What a policy sees of a peer. */
export interface PeerHealthView {
  /** Null when no health was ever recorded. */
  health: PeerHealth | null;
  /** Epoch ms. */
  lastSeen: number;
}

export type UsablePeerPolicy = (peer: PeerHealthView, now: number) => boolean;

/** Window within which an unknown-health peer still counts as usable. */
export const RECENTLY_SEEN_MS = 300_000;

/**
 * Healthy, or unknown and seen within `windowMs`, or never checked.
 *
 * @param windowMs - Recency window (default: 5 minutes)
 */
export function recentlySeenPolicy(windowMs: number = RECENTLY_SEEN_MS): UsablePeerPolicy {
  return (peer, now) =>
    peer.health === "healthy" ||
    peer.health === null ||
    (peer.health === "unknown" && now - peer.lastSeen < windowMs);
}

/** Only peers whose last probe or exchange succeeded. */
export const healthyOnlyPolicy: UsablePeerPolicy = (peer) => peer.health === "healthy";
