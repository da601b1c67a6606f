/* ─── Shared data model ─── */
import type { ChainId, DeliverySeq } from "./types/brands";

/* ─── Primitives ─── */
export type Hex = `0x${string}`;
export type Address = Hex; // 20 bytes, lower-case
export type Path = Hex; // remoteAddress ‖ localAddress, 40 bytes

/* ─── Wire packets ─── */
export const PT_SEND = 0;

/** Rebase-aware transfer: shares are index-independent, index + seq ride along. */
export interface RebaseMessage {
  to: Address;
  shares: bigint;
  rebaseIndex: bigint;
  sequenceNumber: bigint;
}

/** Non-rebasing base packet: a plain token amount. */
export interface TransferMessage {
  to: Address;
  amount: bigint;
}

/* ─── Ledger state blocks ─── */
export interface Account {
  shares: bigint;
  optedOut: boolean;
}

export interface GlobalLedgerState {
  rebaseIndex: bigint;
  totalShares: bigint;
  sequenceNumber: bigint;
}

export interface FailureKey {
  srcChainId: ChainId;
  srcPath: Path;
  deliverySeq: DeliverySeq;
}

/* ─── Notifications ─── */
export type LedgerEvent =
  | { type: "Transfer"; from: Address; to: Address; amount: bigint }
  | { type: "Approval"; owner: Address; spender: Address; amount: bigint }
  | { type: "RebaseIndexUpdated"; updater: Address; rebaseIndex: bigint }
  | { type: "RebaseEnabled"; account: Address }
  | { type: "RebaseDisabled"; account: Address }
  | {
      type: "SendToChain";
      dstChainId: ChainId;
      from: Address;
      to: Address;
      amount: bigint;
    }
  | { type: "ReceiveFromChain"; srcChainId: ChainId; to: Address; amount: bigint }
  | ({ type: "MessageFailed"; payload: Uint8Array; reason: string } & FailureKey)
  | ({ type: "RetryMessageSuccess"; fingerprint: Hex } & FailureKey)
  | { type: "SetTrustedRemote"; remoteChainId: ChainId; path: Path }
  | {
      type: "SetMinDstGas";
      dstChainId: ChainId;
      packetType: number;
      minGas: bigint;
    };

export type Listener = (event: LedgerEvent) => void;
