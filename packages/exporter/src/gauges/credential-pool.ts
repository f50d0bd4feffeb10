/**
 * Credential Pool: ordered API keys and the failover policy over them.
 *
 * Failover is a pure state machine: each fetch starts again from rank 0 and
 * only an authorization-class rejection advances it. Nothing is remembered
 * between fetches, so a key that was locked out is tried fresh next cycle.
 */

import type { Credential } from "@streamflow-exporter/shared";

export type FailoverState =
  | { phase: "try"; credential: Credential; index: number }
  | { phase: "exhausted"; attempted: number };

export interface CredentialKeys {
  primary?: string;
  backup?: string;
}

export class CredentialPool {
  private readonly credentials: readonly Credential[];

  constructor(credentials: readonly Credential[]) {
    if (credentials.length === 0) {
      throw new Error("Credential pool needs at least one credential");
    }
    this.credentials = Object.freeze(
      [...credentials]
        .sort((a, b) => a.rank - b.rank)
        .map((c) => Object.freeze({ ...c })),
    );
  }

  /**
   * Build the pool from configured keys. Without any key the upstream is
   * called anonymously; a backup without a primary is promoted to rank 0.
   */
  static fromKeys(keys: CredentialKeys): CredentialPool {
    const credentials: Credential[] = [];
    if (keys.primary) {
      credentials.push({ label: "primary", rank: credentials.length, apiKey: keys.primary });
    }
    if (keys.backup) {
      credentials.push({ label: "backup", rank: credentials.length, apiKey: keys.backup });
    }
    if (credentials.length === 0) {
      credentials.push({ label: "anonymous", rank: 0, apiKey: null });
    }
    return new CredentialPool(credentials);
  }

  /** Credentials in failover order */
  ordered(): readonly Credential[] {
    return this.credentials;
  }

  get size(): number {
    return this.credentials.length;
  }

  /** Initial state of a fetch: try the highest-ranked credential */
  start(): FailoverState {
    return { phase: "try", credential: this.credentials[0], index: 0 };
  }

  /** Transition after the current credential was rejected */
  advance(state: FailoverState): FailoverState {
    if (state.phase === "exhausted") return state;
    const next = state.index + 1;
    if (next >= this.credentials.length) {
      return { phase: "exhausted", attempted: this.credentials.length };
    }
    return { phase: "try", credential: this.credentials[next], index: next };
  }
}
