import { loadConfig, type Config } from "./config";
import { CrossChainError } from "./core/errors";
import type { Unit, UnitParams } from "./core/unit";
import { Chain } from "./env/chain";
import { makeLogger, type ILogger } from "./logging";
import { provisionUnit, type FacetFactory } from "./provision";
import { LocalRouter, type DeliveryReport, type FeeSchedule } from "./relay/localRouter";
import { asAddress, asChainSelector, ZERO_ADDRESS, type Address, type ChainSelector } from "./types/brands";

export const DEFAULT_NATIVE_FEES: FeeSchedule = { baseFee: 1_000n, bytePrice: 10n, tokenTransferFee: 500n };

type Domain = { chain: Chain; router: LocalRouter };

/* ──────────── runtime shell: chains joined by local routers ──────────── */
export class LocalNetwork {
  readonly log: ILogger;
  private readonly domains = new Map<ChainSelector, Domain>();

  constructor(private readonly config: Config = loadConfig()) {
    this.log = makeLogger(config.logLevel, config.logPretty);
  }

  addChain(
    name: string,
    selector: bigint | number,
    opts: { router?: Address; fees?: ReadonlyMap<Address, FeeSchedule> } = {},
  ): Domain {
    const sel = asChainSelector(selector);
    const chain = new Chain(sel, name, this.log);
    const router = new LocalRouter(chain, opts.router ?? routerAddressFor(sel), {
      fees: opts.fees ?? new Map([[ZERO_ADDRESS, DEFAULT_NATIVE_FEES]]),
      log: this.log,
    });
    for (const other of this.domains.values()) router.connect(other.router);
    const domain = { chain, router };
    this.domains.set(sel, domain);
    this.log.info({ chain: name, selector: sel.toString() }, "chain added");
    return domain;
  }

  domain(selector: ChainSelector): Domain {
    const d = this.domains.get(selector);
    if (!d) throw new CrossChainError("UnsupportedChain", `unknown chain ${selector}`);
    return d;
  }

  /** Deploys a unit wired to the chain's local router. */
  provision(
    selector: ChainSelector,
    address: Address,
    deployer: Address,
    params: Omit<UnitParams, "router">,
    facets: readonly FacetFactory[] = [],
  ): Unit {
    const { chain, router } = this.domain(selector);
    return provisionUnit(chain, address, deployer, { ...params, router: router.address }, facets, {
      gasLimit: this.config.gasLimit,
    });
  }

  /** One delivery pass over every router. */
  deliverAll(): DeliveryReport[] {
    return [...this.domains.values()].flatMap(({ router }) => router.deliver());
  }
}

const routerAddressFor = (selector: ChainSelector): Address =>
  asAddress("0x" + "0e".repeat(12) + selector.toString(16).padStart(16, "0"));
