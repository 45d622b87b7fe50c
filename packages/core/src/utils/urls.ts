/** True for hosts reached over plain http: localhost, 127.0.0.1, *.local and *.internal. */
export function isDomainLocalhost(domain: string): boolean {
  const host = domain.split(":")[0];
  const labels = host.split(".");
  const tld = labels[labels.length - 1];
  return host === "localhost" || host === "127.0.0.1" || tld === "local" || tld === "internal";
}

export function schemeForDomain(domain: string): "http" | "https" {
  return isDomainLocalhost(domain) ? "http" : "https";
}
