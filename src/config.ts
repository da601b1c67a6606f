import { readFileSync } from "node:fs";
import * as v from "valibot";
import { DEFAULT_PAYLOAD_SIZE_LIMIT } from "./core/transport";
import { LedgerError } from "./errors";
import { asChainId } from "./types/brands";
import { normalizeAddress } from "./utils/bytes";

/* JSON has no bigint: integers may arrive as decimal strings */
const uintSchema = v.union([
  v.pipe(v.bigint(), v.minValue(0n)),
  v.pipe(v.number(), v.integer(), v.minValue(0), v.transform((n) => BigInt(n))),
  v.pipe(v.string(), v.regex(/^[0-9]+$/, "expected a decimal integer"), v.transform((s) => BigInt(s))),
]);

const addressSchema = v.pipe(
  v.string(),
  v.regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte hex address"),
  v.transform(normalizeAddress),
);

const chainIdSchema = v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(65_535), v.transform(asChainId));

export const TransportConfigSchema = v.object({
  defaultPayloadSizeLimit: v.optional(
    v.pipe(v.number(), v.integer(), v.minValue(1)),
    DEFAULT_PAYLOAD_SIZE_LIMIT,
  ),
  useCustomAdapterParams: v.optional(v.boolean(), false),
});

export const LedgerConfigSchema = v.object({
  name: v.pipe(v.string(), v.minLength(1)),
  symbol: v.pipe(v.string(), v.minLength(1)),
  decimals: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(36)), 18),
  chainId: chainIdSchema,
  mainChainId: chainIdSchema,
  address: addressSchema,
  owner: addressSchema,
  // no default: the starting index is a deployment decision
  initialRebaseIndex: v.pipe(uintSchema, v.check((n) => n > 0n, "initialRebaseIndex must be positive")),
  transport: v.optional(TransportConfigSchema, {}),
});

export type LedgerConfigInput = v.InferInput<typeof LedgerConfigSchema>;
export type LedgerConfig = v.InferOutput<typeof LedgerConfigSchema>;
export type TransportConfig = v.InferOutput<typeof TransportConfigSchema>;

export const parseLedgerConfig = (input: unknown): LedgerConfig => {
  const result = v.safeParse(LedgerConfigSchema, input);
  if (result.success) return result.output;
  const problems = result.issues.map((issue) => `${v.getDotPath(issue) ?? "<root>"}: ${issue.message}`);
  throw new LedgerError("InvalidConfig", `invalid ledger config: ${problems.join("; ")}`, {
    issues: problems,
  });
};

export const readLedgerConfig = (path: string): LedgerConfig => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new LedgerError("InvalidConfig", `cannot read ledger config at ${path}`, { cause: String(err) });
  }
  return parseLedgerConfig(raw);
};
