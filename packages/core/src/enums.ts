/**
 * Mortgage providers with a scraper implementation
 */
export enum ProviderId {
  ICA = "ica",
  SBAB = "sbab",
  HYPOTEKET = "hypoteket",
  SKANDIA = "skandia",
}

export const ProviderNames: Record<ProviderId, string> = {
  [ProviderId.ICA]: "ICA Banken",
  [ProviderId.SBAB]: "SBAB",
  [ProviderId.HYPOTEKET]: "Hypoteket",
  [ProviderId.SKANDIA]: "Skandia",
};

export const ProviderUrls: Record<ProviderId, string> = {
  [ProviderId.ICA]: "https://www.icabanken.se",
  [ProviderId.SBAB]: "https://www.sbab.se",
  [ProviderId.HYPOTEKET]: "https://www.hypoteket.com",
  [ProviderId.SKANDIA]: "https://www.skandia.se",
};

export enum SinkKind {
  CSV = "csv",
}
