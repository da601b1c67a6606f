// RLP packet codec for ledger-to-ledger messages.

import { decode, encode, type NestedUint8Array } from "rlp";
import { LedgerError, describeError, ledgerAssert } from "../errors";
import { PT_SEND, type RebaseMessage, type TransferMessage } from "../types";
import { bytesToHex, hexToBytes, normalizeAddress } from "../utils/bytes";

/* — helpers — */
const bufToBn = (b: Uint8Array): bigint => {
  if (b.length > 32) throw new LedgerError("MalformedPayload", "integer wider than 256 bits");
  return b.length === 0 ? 0n : BigInt(bytesToHex(b));
};

const malformed = (why: string, context: Record<string, unknown> = {}) =>
  new LedgerError("MalformedPayload", why, context);

const fieldsOf = (payload: Uint8Array): Uint8Array[] => {
  let decoded: Uint8Array | NestedUint8Array;
  try {
    decoded = decode(payload);
  } catch (err) {
    throw malformed(`undecodable payload: ${describeError(err)}`);
  }
  if (!Array.isArray(decoded)) throw malformed("payload is not a list");
  const fields: Uint8Array[] = [];
  for (const f of decoded) {
    if (!(f instanceof Uint8Array)) throw malformed("nested list in packet");
    fields.push(f);
  }
  if (fields.length === 0) throw malformed("empty packet");
  return fields;
};

const checkTag = (tag: Uint8Array): void => {
  const packetType = bufToBn(tag);
  if (packetType !== BigInt(PT_SEND))
    throw new LedgerError("UnknownPacketType", `unknown packet type ${packetType}`, {
      packetType: packetType.toString(),
    });
};

const addressOf = (b: Uint8Array) => {
  if (b.length !== 20) throw malformed("destination is not 20 bytes", { length: b.length });
  return normalizeAddress(bytesToHex(b));
};

export const packetTypeOf = (payload: Uint8Array): number => Number(bufToBn(fieldsOf(payload)[0]));

/* — rebase transfer — */
export const encodeRebasePacket = (m: RebaseMessage): Uint8Array =>
  encode([PT_SEND, hexToBytes(m.to), m.shares, m.rebaseIndex, m.sequenceNumber]);

export const decodeRebasePacket = (payload: Uint8Array): RebaseMessage => {
  const fields = fieldsOf(payload);
  checkTag(fields[0]);
  if (fields.length !== 5) throw malformed("rebase packet needs 5 fields", { fields: fields.length });
  const [, to, shares, rebaseIndex, sequenceNumber] = fields;
  return {
    to: addressOf(to),
    shares: bufToBn(shares),
    rebaseIndex: bufToBn(rebaseIndex),
    sequenceNumber: bufToBn(sequenceNumber),
  };
};

/* — base (non-rebasing) transfer — */
export const encodeTransferPacket = (m: TransferMessage): Uint8Array =>
  encode([PT_SEND, hexToBytes(m.to), m.amount]);

export const decodeTransferPacket = (payload: Uint8Array): TransferMessage => {
  const fields = fieldsOf(payload);
  checkTag(fields[0]);
  if (fields.length !== 3) throw malformed("transfer packet needs 3 fields", { fields: fields.length });
  return { to: addressOf(fields[1]), amount: bufToBn(fields[2]) };
};

/* — adapter params: uint16 version ‖ uint256 gas — */
export const ADAPTER_PARAMS_GAS_OFFSET = 34;

export const encodeAdapterParams = (gas: bigint, version = 1): Uint8Array => {
  ledgerAssert(gas >= 0n && gas < 2n ** 256n, "InvalidAdapterParams", "gas out of uint256 range");
  const ver = version.toString(16).padStart(4, "0");
  return hexToBytes(`0x${ver}${gas.toString(16).padStart(64, "0")}`);
};

/** Reads the 32-byte gas word ending at byte 34. */
export const gasLimitOf = (params: Uint8Array): bigint => {
  ledgerAssert(
    params.length >= ADAPTER_PARAMS_GAS_OFFSET,
    "InvalidAdapterParams",
    "invalid adapter params",
    { length: params.length },
  );
  return bufToBn(params.subarray(ADAPTER_PARAMS_GAS_OFFSET - 32, ADAPTER_PARAMS_GAS_OFFSET));
};
