import { LedgerError, describeError } from "../errors";
import { big, type ILogger } from "../logging";
import { asDeliverySeq, type ChainId } from "../types/brands";
import type { Address, Path } from "../types";
import { channelKey, inboundPath, initRouter, route, type Channel, type OutMsg } from "../core/router";
import { fingerprint, type Endpoint, type MessageReceiver } from "../core/transport";
import { hexToBytes, normalizeAddress } from "../utils/bytes";

interface StoredPayload {
  msg: OutMsg;
  reason: string;
}

const receiverKey = (chainId: ChainId, address: Address) => `${chainId}:${address}`;

/**
 * In-process messaging endpoint shared by every ledger instance of a
 * simulation. Sends are queued per channel and delivered in sequence order
 * on {@link flush}. A receiver that throws blocks its channel until the
 * stored payload is retried or dropped.
 */
export class InMemoryEndpoint implements Endpoint {
  readonly address: Address;
  private router = initRouter();
  private pending: OutMsg[] = [];
  private readonly receivers = new Map<string, MessageReceiver>();
  private readonly outboundSeq = new Map<string, bigint>();
  private readonly inboundSeq = new Map<string, bigint>();
  private readonly stored = new Map<string, StoredPayload>();

  constructor(
    private readonly log: ILogger,
    address: Address = "0x00000000000000000000000000000000000e0d00",
  ) {
    this.address = normalizeAddress(address);
  }

  register(chainId: ChainId, address: Address, receiver: MessageReceiver): void {
    const key = receiverKey(chainId, address);
    if (this.receivers.has(key)) throw new Error(`receiver already registered at ${key}`);
    this.receivers.set(key, receiver);
  }

  send(
    src: { chainId: ChainId; address: Address },
    dstChainId: ChainId,
    path: Path,
    payload: Uint8Array,
    _adapterParams: Uint8Array,
  ): void {
    if (hexToBytes(path).length !== 40) throw new Error("path must be 40 bytes");
    const channel: Channel = {
      srcChainId: src.chainId,
      srcAddress: src.address,
      dstChainId,
      dstAddress: normalizeAddress(path.slice(0, 42)),
    };
    const key = channelKey(channel);
    const seq = (this.outboundSeq.get(key) ?? 0n) + 1n;
    this.outboundSeq.set(key, seq);

    this.pending.push({ channel, key, seq: asDeliverySeq(seq), payload });
    this.log.debug({ channel: key, seq: big(seq), bytes: payload.length }, "queued");
  }

  /** Messages not yet delivered, blocked channels included. */
  get queued(): number {
    return this.router.queue.length + this.pending.length;
  }

  /** Delivers everything deliverable, including messages sent while delivering. */
  flush(): number {
    let delivered = 0;
    for (;;) {
      const { nextRouter, inbox } = route(this.router, this.pending, {
        canDeliver: (m) =>
          !this.stored.has(m.key) &&
          this.receivers.has(receiverKey(m.channel.dstChainId, m.channel.dstAddress)),
      });
      this.router = nextRouter;
      this.pending = [];
      if (inbox.length === 0) return delivered;

      for (const m of inbox) {
        // an earlier message in this batch may have blocked the channel
        if (this.stored.has(m.key)) this.pending.push(m);
        else {
          this.deliver(m);
          delivered++;
        }
      }
    }
  }

  hasStoredPayload(channel: Channel): boolean {
    return this.stored.has(channelKey(channel));
  }

  storedPayloadReason(channel: Channel): string | null {
    return this.stored.get(channelKey(channel))?.reason ?? null;
  }

  /** Re-delivers a blocking payload; failure propagates and keeps the channel blocked. */
  retryPayload(channel: Channel, payload: Uint8Array): void {
    const key = channelKey(channel);
    const entry = this.stored.get(key);
    if (!entry) throw new LedgerError("NoStoredFailedMessage", "no stored payload", { channel: key });
    if (fingerprint(entry.msg.payload) !== fingerprint(payload))
      throw new LedgerError("PayloadFingerprintMismatch", "invalid payload", { channel: key });
    this.receiverFor(entry.msg).receive(this.address, channel.srcChainId, inboundPath(channel), entry.msg.seq, payload);
    this.stored.delete(key);
  }

  /** Drops a blocking payload so the channel resumes. */
  forceResumeReceive(channel: Channel): void {
    const key = channelKey(channel);
    if (!this.stored.delete(key))
      throw new LedgerError("NoStoredFailedMessage", "no stored payload", { channel: key });
    this.log.warn({ channel: key }, "stored payload dropped");
  }

  private deliver(m: OutMsg): void {
    const expected = (this.inboundSeq.get(m.key) ?? 0n) + 1n;
    if (m.seq !== expected)
      throw new Error(`out-of-order delivery on ${m.key}: expected ${expected}, got ${m.seq}`);
    this.inboundSeq.set(m.key, m.seq);

    try {
      this.receiverFor(m).receive(this.address, m.channel.srcChainId, inboundPath(m.channel), m.seq, m.payload);
    } catch (err) {
      const reason = describeError(err);
      this.stored.set(m.key, { msg: m, reason });
      this.log.warn({ channel: m.key, seq: big(m.seq), reason }, "receiver threw; channel blocked");
    }
  }

  private receiverFor(m: OutMsg): MessageReceiver {
    const receiver = this.receivers.get(receiverKey(m.channel.dstChainId, m.channel.dstAddress));
    if (!receiver) throw new Error(`no receiver at ${m.channel.dstChainId}:${m.channel.dstAddress}`);
    return receiver;
  }
}
