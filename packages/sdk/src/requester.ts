/**
 * UMA SDK: outbound HTTP used to reach counterparty VASPs.
 */

/** Fetches text from a URL. Failures are thrown to the caller unchanged; nothing is retried. */
export interface UmaRequester {
  makeGetRequest(url: string): Promise<string>;
}

/** {@link UmaRequester} over the global `fetch`. */
export class FetchUmaRequester implements UmaRequester {
  constructor(private readonly init: RequestInit = {}) {}

  async makeGetRequest(url: string): Promise<string> {
    const response = await fetch(url, { ...this.init, method: "GET" });
    if (!response.ok) {
      throw new Error(`Error making request to ${url}: HTTP ${response.status} ${response.statusText}`);
    }
    return response.text();
  }
}
