export { RebaseToken, type TokenDeps } from "./token";
export { OmnichainRebaseToken, type OmnichainDeps } from "./omnichainToken";
export {
  LedgerConfigSchema,
  TransportConfigSchema,
  parseLedgerConfig,
  readLedgerConfig,
  type LedgerConfig,
  type LedgerConfigInput,
  type TransportConfig,
} from "./config";
export { LedgerError, isLedgerError, type LedgerErrorCode } from "./errors";
export { makeLogger, type ILogger } from "./logging";
export { InMemoryEndpoint } from "./infra/endpoint";
export type { Channel } from "./core/router";
export type { Endpoint, MessageReceiver } from "./core/transport";
export { DEFAULT_PAYLOAD_SIZE_LIMIT, fingerprint } from "./core/transport";
export { DEAD_ADDRESS, type CreditHook } from "./core/bridge";
export { UNIT, MAX_UINT256, toShares, toTokens } from "./core/math";
export {
  encodeAdapterParams,
  encodeRebasePacket,
  decodeRebasePacket,
  encodeTransferPacket,
  decodeTransferPacket,
} from "./codec/packet";
export { asChainId, asDeliverySeq, type ChainId, type DeliverySeq } from "./types/brands";
export { PT_SEND } from "./types";
export type {
  Account,
  Address,
  GlobalLedgerState,
  Hex,
  Path,
  LedgerEvent,
  Listener,
  RebaseMessage,
  TransferMessage,
} from "./types";
