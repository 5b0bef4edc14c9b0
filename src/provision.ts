import type { Facet } from "./core/dispatch";
import { Unit, type UnitOptions, type UnitParams } from "./core/unit";
import type { Chain } from "./env/chain";
import type { Address } from "./types/brands";

export type FacetFactory = (unit: Unit) => Facet;

/**
 * Runs a unit's one-time initializer, cuts in its facets as the deployer
 * and makes it reachable for relays on `chain`.
 */
export const provisionUnit = (
  chain: Chain,
  address: Address,
  deployer: Address,
  params: UnitParams,
  facets: readonly FacetFactory[] = [],
  opts: UnitOptions = {},
): Unit => {
  const unit = new Unit(chain, address, opts);
  unit.init(deployer, params);
  if (facets.length > 0) unit.diamondCut(deployer, { add: facets.map((make) => make(unit)) });
  chain.registerReceiver(unit);
  return unit;
};
