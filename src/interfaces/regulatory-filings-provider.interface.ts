export const REGULATORY_FILINGS_PROVIDER = Symbol('REGULATORY_FILINGS_PROVIDER');

/**
 * One reported value of an XBRL concept
 */
export interface SecFact {
  end: string;
  val: number;
  form: string;
  filed: string;
  accn?: string;
  fy?: number;
  fp?: string;
  start?: string;
  frame?: string;
}

/**
 * USD-denominated us-gaap facts of one company, keyed by concept name
 */
export type UsGaapFacts = Record<string, SecFact[]>;

export interface RegulatoryFilingsProvider {
  readonly name: string;

  /**
   * @throws IdentifierNotFoundException when the ticker has no CIK
   * @throws ProviderUnavailableException on HTTP or network failure
   */
  fetchCompanyFacts(ticker: string): Promise<UsGaapFacts>;
}
