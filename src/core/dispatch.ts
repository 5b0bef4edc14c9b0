import * as rlp from "rlp";
import type { Item } from "../codec/rlp";
import { selectorOf } from "../crypto/hash";
import { asSelector, type Address, type Selector } from "../types/brands";
import { bytesToHex, hexToBytes } from "../utils/bytes";
import { CrossChainError } from "./errors";
import { JournaledMap, type Journal } from "./journal";

export type CallContext = {
  sender: Address; // immediate caller; the unit itself for relayed payloads
};

export type Handler = (ctx: CallContext, args: Item[]) => Uint8Array | void;

/** A capability module: function signatures mapped to handlers. */
export interface Facet {
  readonly name: string;
  readonly functions: Readonly<Record<string, Handler>>;
}

type Route = { facet: string; signature: string; handler: Handler };

/* ── call data: selector ‖ rlp(args) ─────────────────────── */
export const encodeCall = (signature: string, args: rlp.Input[] = []): Uint8Array => {
  const selector = selectorOf(signature);
  const body = rlp.encode(args);
  const out = new Uint8Array(4 + body.length);
  out.set(hexToBytes(selector), 0);
  out.set(body, 4);
  return out;
};

export const decodeCall = (calldata: Uint8Array): { selector: Selector; args: Item[] } => {
  if (calldata.length < 4)
    throw new CrossChainError("MalformedPayload", `call data too short (${calldata.length} bytes)`);
  const selector = asSelector(bytesToHex(calldata.subarray(0, 4)));
  let args: Item;
  try {
    args = rlp.decode(calldata.subarray(4));
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new CrossChainError("MalformedPayload", `call arguments: ${detail}`, { selector });
  }
  if (args instanceof Uint8Array)
    throw new CrossChainError("MalformedPayload", "call arguments must be a list", { selector });
  return { selector, args };
};

/**
 * Closed selector → handler table. Only facets cut in by the unit are
 * reachable; there is no fallback to arbitrary targets. Registrations are
 * journaled, so a failed cut leaves the table as it was.
 */
export class DispatchTable {
  private readonly routes: JournaledMap<Selector, Route>;

  constructor(journal: Journal) {
    this.routes = new JournaledMap(journal);
  }

  addFacet(facet: Facet): Selector[] {
    const entries = Object.entries(facet.functions).map(
      ([signature, handler]) => [selectorOf(signature), { facet: facet.name, signature, handler }] as const,
    );
    for (const [selector, route] of entries) {
      const taken = this.routes.get(selector);
      if (taken)
        throw new CrossChainError(
          "SelectorAlreadyRegistered",
          `${route.signature} clashes with ${taken.facet}.${taken.signature}`,
          { selector },
        );
    }
    for (const [selector, route] of entries) this.routes.set(selector, route);
    return entries.map(([s]) => s);
  }

  /** Drops every selector owned by `name` and returns them. */
  removeFacet(name: string): Selector[] {
    const owned = [...this.routes.entries()].filter(([, r]) => r.facet === name).map(([s]) => s);
    for (const selector of owned) this.routes.delete(selector);
    return owned;
  }

  facetOf(selector: Selector): string | undefined {
    return this.routes.get(selector)?.facet;
  }

  selectors(): Selector[] {
    return [...this.routes.keys()];
  }

  dispatch(ctx: CallContext, calldata: Uint8Array): Uint8Array {
    const { selector, args } = decodeCall(calldata);
    const route = this.routes.get(selector);
    if (!route)
      throw new CrossChainError("UnknownSelector", `no facet handles ${selector}`, { selector });
    const out = route.handler(ctx, args);
    return out instanceof Uint8Array ? out : new Uint8Array(0);
  }
}
