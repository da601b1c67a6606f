// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type ChainId = Brand<number, "ChainId">;
export type DeliverySeq = Brand<bigint, "DeliverySeq">;

export const asChainId = (n: number): ChainId => n as ChainId;
export const asDeliverySeq = (n: bigint): DeliverySeq => n as DeliverySeq;
