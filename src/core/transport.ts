import { keccak_256 } from "@noble/hashes/sha3";
import { gasLimitOf } from "../codec/packet";
import { LedgerError, describeError, ledgerAssert } from "../errors";
import type { ILogger } from "../logging";
import type { ChainId, DeliverySeq } from "../types/brands";
import { PT_SEND, type Address, type Hex, type Path } from "../types";
import { bytesToHex, equalBytes, hexToBytes, normalizeAddress } from "../utils/bytes";
import type { EventLog } from "./events";
import { Cell, JournaledMap, type Journal } from "./journal";

export const DEFAULT_PAYLOAD_SIZE_LIMIT = 10_000;

// remoteAddress ‖ localAddress
const TRUSTED_PATH_RE = /^0x[0-9a-fA-F]{80}$/;

export const fingerprint = (payload: Uint8Array): Hex => bytesToHex(keccak_256(payload));

/** Whatever accepts deliveries from an endpoint. */
export interface MessageReceiver {
  receive(
    caller: Address,
    srcChainId: ChainId,
    srcPath: Path,
    deliverySeq: DeliverySeq,
    payload: Uint8Array,
  ): void;
}

/** The process-wide messaging endpoint, injected once per ledger. */
export interface Endpoint {
  readonly address: Address;
  register(chainId: ChainId, address: Address, receiver: MessageReceiver): void;
  send(
    src: { chainId: ChainId; address: Address },
    dstChainId: ChainId,
    path: Path,
    payload: Uint8Array,
    adapterParams: Uint8Array,
  ): void;
}

export type MessageHandler = (
  srcChainId: ChainId,
  srcPath: Path,
  deliverySeq: DeliverySeq,
  payload: Uint8Array,
) => void;

export interface TransportOptions {
  chainId: ChainId;
  address: Address;
  endpoint: Endpoint;
  defaultPayloadSizeLimit: number;
  useCustomAdapterParams: boolean;
}

type Outbound = { dstChainId: ChainId; path: Path; payload: Uint8Array; adapterParams: Uint8Array };

const failureKey = (srcChainId: ChainId, srcPath: Path, seq: DeliverySeq) =>
  `${srcChainId}:${srcPath.toLowerCase()}:${seq}`;

/**
 * Authenticated, non-blocking message transport.
 *
 * Inbound: the source path must match the trusted path for the source chain
 * byte for byte. The application handler then runs in a nested journal
 * scope; if it throws, its writes are reverted, the payload fingerprint is
 * kept for {@link retryMessage} and the channel stays open.
 *
 * Outbound: messages queue locally and reach the endpoint only when the
 * sending operation commits.
 */
export class MessageTransport implements MessageReceiver {
  private readonly trustedRemotes: JournaledMap<ChainId, Path | null>;
  private readonly payloadLimits: JournaledMap<ChainId, number>;
  private readonly minDstGas: JournaledMap<string, bigint>;
  private readonly customAdapterParams: Cell<boolean>;
  private readonly failed: JournaledMap<string, Hex | null>;
  private outbox: Outbound[] = [];
  private handler: MessageHandler | null = null;

  constructor(
    private readonly journal: Journal,
    private readonly events: EventLog,
    private readonly log: ILogger,
    private readonly opts: TransportOptions,
  ) {
    this.trustedRemotes = new JournaledMap(journal, null);
    this.payloadLimits = new JournaledMap(journal, 0);
    this.minDstGas = new JournaledMap(journal, 0n);
    this.customAdapterParams = new Cell(journal, opts.useCustomAdapterParams);
    this.failed = new JournaledMap(journal, null);
    journal.onCommit(() => this.flushOutbox());
    opts.endpoint.register(opts.chainId, opts.address, this);
  }

  attachHandler(handler: MessageHandler): void {
    if (this.handler) throw new Error("message handler already attached");
    this.handler = handler;
  }

  /* ── trusted remotes ─────────────────────────────────────── */

  setTrustedRemote(remoteChainId: ChainId, path: Path): void {
    ledgerAssert(TRUSTED_PATH_RE.test(path), "InvalidConfig", "trusted path must be 40 bytes", { remoteChainId, path });
    const normalized: Path = bytesToHex(hexToBytes(path));
    this.trustedRemotes.set(remoteChainId, normalized);
    this.events.emit({ type: "SetTrustedRemote", remoteChainId, path: normalized });
  }

  /** Trusts `remoteAddress` on `remoteChainId`; the path gets our address appended. */
  setTrustedRemoteAddress(remoteChainId: ChainId, remoteAddress: Address): void {
    this.setTrustedRemote(remoteChainId, `${normalizeAddress(remoteAddress)}${this.opts.address.slice(2)}`);
  }

  getTrustedRemoteAddress(remoteChainId: ChainId): Address {
    const path = this.trustedRemotes.get(remoteChainId);
    if (path === null)
      throw new LedgerError("UntrustedDestination", "no trusted path for chain", { remoteChainId });
    return normalizeAddress(path.slice(0, 42));
  }

  isTrustedRemote(srcChainId: ChainId, srcPath: Path): boolean {
    const trusted = this.trustedRemotes.get(srcChainId);
    return trusted !== null && equalBytes(hexToBytes(trusted), hexToBytes(srcPath));
  }

  /* ── policy ──────────────────────────────────────────────── */

  setPayloadSizeLimit(dstChainId: ChainId, size: number): void {
    ledgerAssert(Number.isInteger(size) && size > 0, "InvalidConfig", "payload size limit must be a positive integer");
    this.payloadLimits.set(dstChainId, size);
  }

  payloadSizeLimit(dstChainId: ChainId): number {
    return this.payloadLimits.get(dstChainId) || this.opts.defaultPayloadSizeLimit;
  }

  setMinDstGas(dstChainId: ChainId, packetType: number, minGas: bigint): void {
    ledgerAssert(minGas > 0n, "InvalidConfig", "min gas must be positive");
    this.minDstGas.set(`${dstChainId}:${packetType}`, minGas);
    this.events.emit({ type: "SetMinDstGas", dstChainId, packetType, minGas });
  }

  setUseCustomAdapterParams(enabled: boolean): void {
    this.customAdapterParams.set(enabled);
  }

  /* ── outbound ────────────────────────────────────────────── */

  send(dstChainId: ChainId, payload: Uint8Array, adapterParams: Uint8Array, packetType = PT_SEND): void {
    const path = this.trustedRemotes.get(dstChainId);
    if (path === null)
      throw new LedgerError("UntrustedDestination", "destination chain is not a trusted source", { dstChainId });
    this.checkPayloadSize(dstChainId, payload.length);
    this.checkAdapterParams(dstChainId, packetType, adapterParams);

    this.outbox.push({ dstChainId, path, payload, adapterParams });
    if (!this.journal.inScope) {
      this.flushOutbox();
      return;
    }
    this.journal.record(() => {
      this.outbox.pop();
    });
  }

  private checkPayloadSize(dstChainId: ChainId, size: number): void {
    const limit = this.payloadSizeLimit(dstChainId);
    if (size > limit)
      throw new LedgerError("PayloadTooLarge", "payload size is too large", { dstChainId, size, limit });
  }

  private checkAdapterParams(dstChainId: ChainId, packetType: number, params: Uint8Array): void {
    if (!this.customAdapterParams.get()) {
      ledgerAssert(params.length === 0, "InvalidAdapterParams", "adapter params must be empty");
      return;
    }
    const provided = gasLimitOf(params);
    const minGas = this.minDstGas.get(`${dstChainId}:${packetType}`);
    ledgerAssert(minGas > 0n, "MinGasNotSet", "min gas limit not set", { dstChainId, packetType });
    if (provided < minGas)
      throw new LedgerError("InsufficientGasLimit", "gas limit is too low", {
        provided: provided.toString(),
        minGas: minGas.toString(),
      });
  }

  /** Messages committed but not yet accepted by the endpoint. */
  get queuedOutbound(): number {
    return this.outbox.length;
  }

  /**
   * Runs after commit, so it cannot throw: a message the endpoint rejects
   * stays queued, with everything behind it, until the next commit.
   */
  private flushOutbox(): void {
    const src = { chainId: this.opts.chainId, address: this.opts.address };
    while (this.outbox.length > 0) {
      const m = this.outbox[0];
      try {
        this.opts.endpoint.send(src, m.dstChainId, m.path, m.payload, m.adapterParams);
      } catch (err) {
        this.log.error(
          { dstChainId: m.dstChainId, queued: this.outbox.length, reason: describeError(err) },
          "endpoint rejected outbound message; kept queued",
        );
        return;
      }
      this.outbox.shift();
    }
  }

  /* ── inbound ─────────────────────────────────────────────── */

  receive(
    caller: Address,
    srcChainId: ChainId,
    srcPath: Path,
    deliverySeq: DeliverySeq,
    payload: Uint8Array,
  ): void {
    this.journal.atomic(() => {
      ledgerAssert(caller === this.opts.endpoint.address, "NotEndpoint", "caller is not the endpoint", { caller });
      if (!this.isTrustedRemote(srcChainId, srcPath))
        throw new LedgerError("UnauthorizedSource", "invalid source sending contract", { srcChainId, srcPath });

      const handler = this.requireHandler();
      try {
        this.journal.atomic(() => handler(srcChainId, srcPath, deliverySeq, payload));
      } catch (err) {
        const reason = describeError(err);
        this.failed.set(failureKey(srcChainId, srcPath, deliverySeq), fingerprint(payload));
        this.log.warn(
          { srcChainId, srcPath, deliverySeq: deliverySeq.toString(), reason },
          "message application failed; stored for retry",
        );
        this.events.emit({ type: "MessageFailed", srcChainId, srcPath, deliverySeq, payload, reason });
      }
    });
  }

  failedMessageFingerprint(srcChainId: ChainId, srcPath: Path, deliverySeq: DeliverySeq): Hex | null {
    return this.failed.get(failureKey(srcChainId, srcPath, deliverySeq));
  }

  /** Anyone may retry. A second failure propagates and keeps the record. */
  retryMessage(srcChainId: ChainId, srcPath: Path, deliverySeq: DeliverySeq, payload: Uint8Array): void {
    this.journal.atomic(() => {
      const key = failureKey(srcChainId, srcPath, deliverySeq);
      const stored = this.failed.get(key);
      ledgerAssert(stored !== null, "NoStoredFailedMessage", "no stored message", {
        srcChainId,
        deliverySeq: deliverySeq.toString(),
      });
      const actual = fingerprint(payload);
      ledgerAssert(actual === stored, "PayloadFingerprintMismatch", "invalid payload", { stored, actual });

      this.failed.delete(key);
      this.requireHandler()(srcChainId, srcPath, deliverySeq, payload);
      this.log.info({ srcChainId, deliverySeq: deliverySeq.toString() }, "failed message retried");
      this.events.emit({ type: "RetryMessageSuccess", srcChainId, srcPath, deliverySeq, fingerprint: actual });
    });
  }

  private requireHandler(): MessageHandler {
    if (!this.handler) throw new Error("no message handler attached");
    return this.handler;
  }
}
