export type LedgerErrorCode =
  | "InsufficientBalance"
  | "InsufficientAllowance"
  | "RebaseOverflow"
  | "InvalidRebaseIndex"
  | "InvalidRebaseIndexMutator"
  | "UnauthorizedSource"
  | "UntrustedDestination"
  | "PayloadTooLarge"
  | "InsufficientGasLimit"
  | "InvalidAdapterParams"
  | "MinGasNotSet"
  | "UnknownPacketType"
  | "MalformedPayload"
  | "OptedOutBridgeRejection"
  | "NoStoredFailedMessage"
  | "PayloadFingerprintMismatch"
  | "NotOwner"
  | "NotEndpoint"
  | "ZeroAddress"
  | "ZeroAmount"
  | "InvalidAmount"
  | "InvalidConfig";

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    code: LedgerErrorCode,
    message: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.context = context;
  }
}

export function ledgerAssert(
  condition: unknown,
  code: LedgerErrorCode,
  message: string,
  context?: Record<string, unknown>,
): asserts condition {
  if (!condition) throw new LedgerError(code, message, context);
}

export const isLedgerError = (
  err: unknown,
  code?: LedgerErrorCode,
): err is LedgerError =>
  err instanceof LedgerError && (code === undefined || err.code === code);

/** Short reason string for failure notifications and logs. */
export const describeError = (err: unknown): string => {
  if (err instanceof LedgerError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
};
