import { isIP } from "node:net";

const LOOPBACK_HOSTNAMES = new Set(["localhost", "127.0.0.1", "::1"]);

/**
 * Returns `true` for loopback peers and interfaces: `127.0.0.0/8`, `::1`, their
 * IPv4-mapped IPv6 forms and `localhost`.
 */
export function isLoopbackAddress(address: string | undefined | null): boolean {
  if (!address) {
    return false;
  }
  const normalised = address.trim().toLowerCase().replace(/^\[(.*)\]$/, "$1");
  if (LOOPBACK_HOSTNAMES.has(normalised)) {
    return true;
  }
  const ipv4 = normalised.startsWith("::ffff:") ? normalised.slice("::ffff:".length) : normalised;
  if (isIP(ipv4) === 4) {
    return ipv4.startsWith("127.");
  }
  return false;
}

export interface BindPolicyOptions {
  /** Accept peers outside the loopback interface. */
  readonly allowRemote: boolean;
}

export type PeerDecision = { readonly ok: true } | { readonly ok: false; readonly reason: "remote_peer" };

/**
 * Network binding policy shared by the listeners: loopback only unless remote
 * access was explicitly enabled. Checked on every connection, independently
 * of the interface the listener is bound to.
 */
export class BindPolicy {
  readonly allowRemote: boolean;

  constructor(options: BindPolicyOptions) {
    this.allowRemote = options.allowRemote;
  }

  admits(remoteAddress: string | undefined): PeerDecision {
    if (this.allowRemote || isLoopbackAddress(remoteAddress)) {
      return { ok: true };
    }
    return { ok: false, reason: "remote_peer" };
  }

  /** Whether the policy lets a listener bind to `host`. */
  permitsHost(host: string): boolean {
    return this.allowRemote || isLoopbackAddress(host);
  }
}
