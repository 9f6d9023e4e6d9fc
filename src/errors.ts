/**
 * Typed errors raised by the network links.
 *
 * Links throw; the components above them (DiscoveryCache, PeerTable,
 * GossipEngine, the loops) catch, log and degrade to "no result".
 */

/** Why a request failed. */
export type RequestFailureCode =
  /** Transport failure: refused, reset, DNS, timeout. */
  | "network"
  /** The server answered with a non-2xx status. */
  | "http_status"
  /** The body was not JSON or did not have the expected shape. */
  | "bad_response";

/** Failure talking to the central directory. */
export class DirectoryError extends Error {
  readonly code: RequestFailureCode;
  readonly status?: number;

  constructor(code: RequestFailureCode, message: string, status?: number) {
    super(message);
    this.name = "DirectoryError";
    this.code = code;
    this.status = status;
  }
}

/** Failure talking to another node's peer endpoints. */
export class PeerRequestError extends Error {
  readonly code: RequestFailureCode;
  readonly status?: number;

  constructor(code: RequestFailureCode, message: string, status?: number) {
    super(message);
    this.name = "PeerRequestError";
    this.code = code;
    this.status = status;
  }
}
