export type { MortgageProvider, ProviderContext, ProviderRequest } from "./types.js";
export { IcaProvider, ICA_PERIODS } from "./ica.js";
export { SbabProvider } from "./sbab.js";
export { HypoteketProvider, INTEREST_TERM_MONTHS } from "./hypoteket.js";
export { SkandiaProvider, parseRateListEntry } from "./skandia.js";

import { ProviderId } from "@bolanekoll/core";
import { IcaProvider } from "./ica.js";
import { SbabProvider } from "./sbab.js";
import { HypoteketProvider } from "./hypoteket.js";
import { SkandiaProvider } from "./skandia.js";
import type { MortgageProvider, ProviderContext } from "./types.js";

export const IMPLEMENTED_PROVIDERS: Record<
  ProviderId,
  new (context: ProviderContext) => MortgageProvider
> = {
  [ProviderId.ICA]: IcaProvider,
  [ProviderId.SBAB]: SbabProvider,
  [ProviderId.HYPOTEKET]: HypoteketProvider,
  [ProviderId.SKANDIA]: SkandiaProvider,
};

/**
 * Creates the provider adapter for the given id
 */
export function createProvider(id: ProviderId, context: ProviderContext): MortgageProvider {
  return new IMPLEMENTED_PROVIDERS[id](context);
}
