/**
 * Default identity registry: the identity used when a request names no base.
 *
 * One slot in a zustand vanilla store. A swap replaces the whole state object,
 * so a reader gets either the old or the new identity.
 */

import { createStore } from "zustand/vanilla";
import type { ResolvedIdentity } from "../types/font.types";

interface DefaultIdentityState {
  identity: ResolvedIdentity | null;
}

export type DefaultIdentityListener = (
  next: ResolvedIdentity | null,
  previous: ResolvedIdentity | null
) => void;

export interface DefaultIdentityRegistry {
  /** Throws when the registry has never been initialized */
  get(): ResolvedIdentity;
  peek(): ResolvedIdentity | null;
  /** Returns the identity it replaced, for restoring later */
  set(identity: ResolvedIdentity | null): ResolvedIdentity | null;
  subscribe(listener: DefaultIdentityListener): () => void;
}

export function createDefaultIdentityRegistry(
  initial: ResolvedIdentity | null = null
): DefaultIdentityRegistry {
  const store = createStore<DefaultIdentityState>()(() => ({ identity: initial }));

  return {
    get() {
      const { identity } = store.getState();
      if (!identity) {
        throw new Error("[DefaultIdentityRegistry] Default identity read before initialization");
      }
      return identity;
    },
    peek() {
      return store.getState().identity;
    },
    set(identity) {
      const previous = store.getState().identity;
      store.setState({ identity }, true);
      return previous;
    },
    subscribe(listener) {
      return store.subscribe((state, prevState) => listener(state.identity, prevState.identity));
    },
  };
}

export const defaultIdentityRegistry = createDefaultIdentityRegistry();
