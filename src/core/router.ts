import type { ChainId, DeliverySeq } from "../types/brands";
import type { Address, Path } from "../types";

/** One direction of traffic between two ledger instances. */
export interface Channel {
  readonly srcChainId: ChainId;
  readonly srcAddress: Address;
  readonly dstChainId: ChainId;
  readonly dstAddress: Address;
}

export const channelKey = (c: Channel): string =>
  `${c.srcChainId}:${c.srcAddress}>${c.dstChainId}:${c.dstAddress}`;

/** Path as the receiver sees it: sender ‖ receiver. */
export const inboundPath = (c: Channel): Path => `${c.srcAddress}${c.dstAddress.slice(2)}`;

export interface OutMsg {
  readonly channel: Channel;
  readonly key: string;
  readonly seq: DeliverySeq;
  readonly payload: Uint8Array;
}

export interface RouterState {
  readonly queue: readonly OutMsg[]; // sorted by (channel, seq)
}

export function initRouter(): RouterState {
  return { queue: [] };
}

/**
 * Merges new messages into the queue, drops duplicate (channel, seq) pairs
 * and splits off what can be delivered now. Once a message on a channel is
 * held back, everything behind it on that channel is held back too.
 */
export function route(
  state: RouterState,
  newMsgs: readonly OutMsg[],
  opts: { canDeliver: (m: OutMsg) => boolean },
): { nextRouter: RouterState; inbox: readonly OutMsg[] } {
  const sorted = [...newMsgs].sort(byChannelSeq);

  const merged: OutMsg[] = [];
  const a = state.queue;
  const b = sorted;
  let i = 0, j = 0;
  while (i < a.length && j < b.length) {
    merged.push(byChannelSeq(a[i], b[j]) <= 0 ? a[i++] : b[j++]);
  }
  merged.push(...a.slice(i), ...b.slice(j));

  const uniq: OutMsg[] = [];
  let prevKey = "";
  for (const m of merged) {
    const key = `${m.key}#${m.seq}`;
    if (key === prevKey) continue;
    uniq.push(m);
    prevKey = key;
  }

  const deliver: OutMsg[] = [];
  const stay: OutMsg[] = [];
  const held = new Set<string>();
  for (const m of uniq) {
    if (!held.has(m.key) && opts.canDeliver(m)) deliver.push(m);
    else {
      held.add(m.key);
      stay.push(m);
    }
  }

  return { nextRouter: { queue: stay }, inbox: deliver };
}

const byChannelSeq = (a: OutMsg, b: OutMsg) =>
  a.key === b.key ? (a.seq < b.seq ? -1 : a.seq > b.seq ? 1 : 0)
                  : a.key < b.key ? -1 : 1;
