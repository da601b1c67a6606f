import { parseLedgerConfig, type LedgerConfig, type LedgerConfigInput } from "../../src/config";
import { UNIT } from "../../src/core/math";
import { InMemoryEndpoint } from "../../src/infra/endpoint";
import { makeLogger } from "../../src/logging";
import { OmnichainRebaseToken } from "../../src/omnichainToken";
import { RebaseToken } from "../../src/token";
import type { ChainId } from "../../src/types/brands";
import type { Address, LedgerEvent } from "../../src/types";
import { CHAIN_1, LEDGER_1, OWNER } from "./accounts";

export const silent = makeLogger({ level: "silent" });

export const ledgerConfig = (over: Partial<LedgerConfigInput> = {}): LedgerConfig =>
  parseLedgerConfig({
    name: "Elastic",
    symbol: "ELS",
    chainId: 1,
    mainChainId: 1,
    address: LEDGER_1,
    owner: OWNER,
    initialRebaseIndex: UNIT,
    ...over,
  });

export const singleChainToken = (over: Partial<LedgerConfigInput> = {}) =>
  new RebaseToken(ledgerConfig(over), { logger: silent });

export interface ChainSetup {
  chainId: ChainId;
  address: Address;
  transport?: LedgerConfigInput["transport"];
}

/**
 * One endpoint, one token per chain, every pair trusting each other.
 * Chain 1 is the main chain unless `mainChainId` says otherwise.
 */
export const makeNetwork = (chains: ChainSetup[], mainChainId: ChainId = CHAIN_1) => {
  const endpoint = new InMemoryEndpoint(silent);
  const tokens = new Map<ChainId, OmnichainRebaseToken>();
  for (const s of chains) {
    const config = ledgerConfig({
      chainId: s.chainId,
      mainChainId,
      address: s.address,
      transport: s.transport,
    });
    tokens.set(s.chainId, new OmnichainRebaseToken(config, { endpoint, logger: silent }));
  }
  for (const a of tokens.values())
    for (const b of tokens.values())
      if (a !== b) a.setTrustedRemoteAddress(OWNER, b.chainId, b.address);

  const chain = (id: ChainId): OmnichainRebaseToken => {
    const token = tokens.get(id);
    if (!token) throw new Error(`no chain ${id}`);
    return token;
  };
  return { endpoint, chain };
};

/** Collects committed notifications. */
export const recordEvents = (token: RebaseToken): LedgerEvent[] => {
  const seen: LedgerEvent[] = [];
  token.subscribe((e) => seen.push(e));
  return seen;
};

export const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
};
