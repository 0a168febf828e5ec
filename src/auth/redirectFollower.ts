import { AppConfig } from "../config";
import { Logger, errorMessage } from "../observability";
import { HttpSession, REDIRECT_STATUSES } from "../session";

/** Completes the identity-provider handshake that follows a successful login POST. */
export interface RedirectFollower {
  readonly mode: "strict" | "simple";
  follow(redirectUrl: string): Promise<boolean>;
}

export type SessionVerifier = () => Promise<boolean>;

const NAVIGATION_HEADERS: Record<string, string> = {
  accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7",
  "accept-encoding": "gzip, deflate, br",
  "cache-control": "no-cache, no-store",
  pragma: "no-cache",
  "sec-ch-ua": '"Microsoft Edge";v="131", "Chromium";v="131", "Not_A_Brand";v="24"',
  "sec-ch-ua-mobile": "?0",
  "sec-ch-ua-platform": '"Windows"',
  "sec-fetch-dest": "document",
  "sec-fetch-mode": "navigate",
  "upgrade-insecure-requests": "1",
};

/**
 * Header set for one hop. Hops on the site itself carry the identity provider as referer;
 * every other host is treated as the identity provider and gets the site as referer.
 * `Host` always follows the hop URL and is left to the HTTP client.
 */
export function buildHopHeaders(hopUrl: string, config: AppConfig): Record<string, string> {
  const site = new URL(config.baseUrl);
  const hop = new URL(hopUrl);

  if (hop.host === site.host) {
    return {
      ...NAVIGATION_HEADERS,
      origin: site.origin,
      referer: `https://${config.identityProviderHost}/`,
      "sec-fetch-site": "cross-site",
    };
  }

  return {
    ...NAVIGATION_HEADERS,
    referer: `${site.origin}/`,
    "sec-fetch-site": "cross-site",
  };
}

export class StrictRedirectFollower implements RedirectFollower {
  readonly mode = "strict";

  constructor(
    private readonly session: HttpSession,
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly verify: SessionVerifier,
  ) {}

  async follow(redirectUrl: string): Promise<boolean> {
    let currentUrl = redirectUrl;

    for (let hop = 1; hop <= this.config.maxRedirectHops; hop += 1) {
      this.logger.debug("auth_redirect_hop", { url: currentUrl, hop });
      const response = await this.session.get(currentUrl, {
        headers: buildHopHeaders(currentUrl, this.config),
        followRedirects: false,
      });
      this.logger.debug("auth_redirect_hop_response", {
        url: currentUrl,
        hop,
        status: response.status,
        cookies: await this.session.cookieNames(currentUrl),
      });

      if (REDIRECT_STATUSES.has(response.status) && response.status !== 308) {
        const location = response.headers.get("location");
        await response.body?.cancel();
        if (!location) {
          this.logger.error("auth_redirect_missing_location", { url: currentUrl, status: response.status });
          return false;
        }
        currentUrl = new URL(location, currentUrl).toString();
        continue;
      }

      await response.body?.cancel();
      if (response.status === 200) {
        return this.verify();
      }

      this.logger.error("auth_redirect_unexpected_status", { url: currentUrl, status: response.status, hop });
      return false;
    }

    this.logger.error("auth_redirect_too_many_hops", { url: currentUrl, maxHops: this.config.maxRedirectHops });
    return false;
  }
}

/** Trusts a 200 from the redirect target without checking the site for a logged-in page. */
export class SimpleRedirectFollower implements RedirectFollower {
  readonly mode = "simple";

  constructor(
    private readonly session: HttpSession,
    private readonly logger: Logger,
  ) {}

  async follow(redirectUrl: string): Promise<boolean> {
    try {
      const response = await this.session.get(redirectUrl);
      await response.body?.cancel();
      if (response.status === 200) {
        return true;
      }
      this.logger.error("auth_redirect_unexpected_status", { url: redirectUrl, status: response.status });
      return false;
    } catch (error) {
      this.logger.error("auth_redirect_error", { url: redirectUrl, error: errorMessage(error) });
      return false;
    }
  }
}
