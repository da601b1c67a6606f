import type { LedgerConfig } from "./config";
import { ChainRoleBridge, type CreditHook } from "./core/bridge";
import { CrossChainSync } from "./core/crossChainSync";
import { MessageTransport, type Endpoint } from "./core/transport";
import type { ChainId, DeliverySeq } from "./types/brands";
import type { Address, GlobalLedgerState, Hex, Path } from "./types";
import { normalizeAddress } from "./utils/bytes";
import { RebaseToken, type TokenDeps } from "./token";

export interface OmnichainDeps extends TokenDeps {
  endpoint: Endpoint;
}

/**
 * Elastic-supply token bridged across chains. The index is owned by a
 * {@link CrossChainSync}: the plain `setRebaseIndex` is rejected with
 * InvalidRebaseIndexMutator and index changes go through
 * {@link syncRebaseIndex} or arrive with inbound transfers.
 */
export class OmnichainRebaseToken extends RebaseToken {
  private readonly sync: CrossChainSync;
  private readonly transport: MessageTransport;
  private readonly bridge: ChainRoleBridge;
  private readonly creditHooks = new Map<Address, CreditHook>();

  constructor(config: LedgerConfig, deps: OmnichainDeps) {
    super(config, deps);
    this.sync = new CrossChainSync(this.journal, this.controller, this.log);
    this.transport = new MessageTransport(this.journal, this.events, this.log, {
      chainId: config.chainId,
      address: config.address,
      endpoint: deps.endpoint,
      defaultPayloadSizeLimit: config.transport.defaultPayloadSizeLimit,
      useCustomAdapterParams: config.transport.useCustomAdapterParams,
    });
    this.bridge = new ChainRoleBridge(
      this.journal,
      this.controller,
      this.sync,
      this.transport,
      this.events,
      this.log,
      {
        self: config.address,
        chainId: config.chainId,
        mainChainId: config.mainChainId,
        hookFor: (to) => this.creditHooks.get(to),
      },
    );
  }

  get isMainChain(): boolean {
    return this.bridge.isMainChain;
  }

  sequenceNumber(): bigint {
    return this.sync.currentSequenceNumber();
  }

  state(): GlobalLedgerState {
    return {
      rebaseIndex: this.rebaseIndex(),
      totalShares: this.totalShares(),
      sequenceNumber: this.sequenceNumber(),
    };
  }

  /** Supply outside main-chain custody. */
  circulatingSupply(): bigint {
    const total = this.totalSupply();
    return this.isMainChain ? total - this.balanceOf(this.address) : total;
  }

  /* ── index ───────────────────────────────────────────────── */

  /** Owner path for the sequenced setter; stale sequence numbers are ignored. */
  syncRebaseIndex(caller: Address, index: bigint, sequenceNumber: bigint): boolean {
    return this.atomic(() => {
      this.onlyOwner(caller);
      return this.sync.syncIndex(index, sequenceNumber, normalizeAddress(caller));
    });
  }

  /* ── bridging ────────────────────────────────────────────── */

  /** Returns the shares carried by the message. */
  sendFrom(
    caller: Address,
    from: Address,
    dstChainId: ChainId,
    to: Address,
    amount: bigint,
    adapterParams: Uint8Array = new Uint8Array(0),
  ): bigint {
    return this.atomic(() =>
      this.bridge.send(
        normalizeAddress(caller),
        normalizeAddress(from),
        dstChainId,
        normalizeAddress(to),
        amount,
        adapterParams,
      ),
    );
  }

  retryMessage(srcChainId: ChainId, srcPath: Path, deliverySeq: DeliverySeq, payload: Uint8Array): void {
    this.transport.retryMessage(srcChainId, srcPath, deliverySeq, payload);
  }

  failedMessageFingerprint(srcChainId: ChainId, srcPath: Path, deliverySeq: DeliverySeq): Hex | null {
    return this.transport.failedMessageFingerprint(srcChainId, srcPath, deliverySeq);
  }

  /** Registers (or clears) the caller's own credit hook. */
  setCreditHook(caller: Address, hook: CreditHook | null): void {
    const who = normalizeAddress(caller);
    if (hook) this.creditHooks.set(who, hook);
    else this.creditHooks.delete(who);
  }

  /* ── transport administration ────────────────────────────── */

  setTrustedRemote(caller: Address, remoteChainId: ChainId, path: Path): void {
    this.atomic(() => {
      this.onlyOwner(caller);
      this.transport.setTrustedRemote(remoteChainId, path);
    });
  }

  setTrustedRemoteAddress(caller: Address, remoteChainId: ChainId, remoteAddress: Address): void {
    this.atomic(() => {
      this.onlyOwner(caller);
      this.transport.setTrustedRemoteAddress(remoteChainId, remoteAddress);
    });
  }

  getTrustedRemoteAddress(remoteChainId: ChainId): Address {
    return this.transport.getTrustedRemoteAddress(remoteChainId);
  }

  isTrustedRemote(srcChainId: ChainId, srcPath: Path): boolean {
    return this.transport.isTrustedRemote(srcChainId, srcPath);
  }

  setPayloadSizeLimit(caller: Address, dstChainId: ChainId, size: number): void {
    this.atomic(() => {
      this.onlyOwner(caller);
      this.transport.setPayloadSizeLimit(dstChainId, size);
    });
  }

  payloadSizeLimit(dstChainId: ChainId): number {
    return this.transport.payloadSizeLimit(dstChainId);
  }

  setMinDstGas(caller: Address, dstChainId: ChainId, packetType: number, minGas: bigint): void {
    this.atomic(() => {
      this.onlyOwner(caller);
      this.transport.setMinDstGas(dstChainId, packetType, minGas);
    });
  }

  setUseCustomAdapterParams(caller: Address, enabled: boolean): void {
    this.atomic(() => {
      this.onlyOwner(caller);
      this.transport.setUseCustomAdapterParams(enabled);
    });
  }
}
