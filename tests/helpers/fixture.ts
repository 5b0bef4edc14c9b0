import { Chain } from "../../src/env/chain";
import { LocalRouter, type FeeSchedule } from "../../src/relay/localRouter";
import { provisionUnit } from "../../src/provision";
import { asChainSelector, ZERO_ADDRESS, type Address } from "../../src/types/brands";
import { ADMIN, LINK, PEER_ROUTER, ROUTER, TKN, UNIT } from "./addresses";
import { createProbe } from "./probe";

export const HOME = asChainSelector(1);
export const PEER = asChainSelector(7);

export const NATIVE_FEES: FeeSchedule = { baseFee: 1_000n, bytePrice: 10n, tokenTransferFee: 500n };
export const LINK_FEES: FeeSchedule = { baseFee: 100n, bytePrice: 1n, tokenTransferFee: 50n };

const fees = new Map<Address, FeeSchedule>([
  [ZERO_ADDRESS, NATIVE_FEES],
  [LINK, LINK_FEES],
]);

/** Unit on chain 1 with a lane to chain 7, probe facet installed. */
export const createFixture = (opts: { router?: Address } = {}) => {
  const chain = new Chain(HOME, "home");
  const peerChain = new Chain(PEER, "peer");
  const router = new LocalRouter(chain, ROUTER, { fees });
  const peerRouter = new LocalRouter(peerChain, PEER_ROUTER, { fees });
  router.connect(peerRouter);
  const link = chain.deployToken(LINK, "LINK");
  const tkn = chain.deployToken(TKN, "TKN");
  const probe = createProbe();
  const unit = provisionUnit(
    chain,
    UNIT,
    ADMIN,
    { name: "Unit", symbol: "UNT", baseUri: "ipfs://test", router: opts.router ?? ROUTER, feeToken: LINK },
    [probe.factory],
  );
  return { chain, peerChain, router, peerRouter, link, tkn, probe, unit };
};
