import { AppConfig, Credentials } from "../config";
import { sleep } from "../core/fetch";
import { Logger, MetricsRegistry, errorMessage } from "../observability";
import { HttpSession } from "../session";
import { findLoginMarker } from "./loginMarker";
import { LoginResult, parseLoginResponse } from "./loginResponse";
import { RedirectFollower, SimpleRedirectFollower, StrictRedirectFollower } from "./redirectFollower";

export interface AuthenticatorDeps {
  session: HttpSession;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  /** Overrides the follower picked from `config.redirectMode`. */
  follower?: RedirectFollower;
}

export class LoginFailedError extends Error {
  constructor(message = "Login failed") {
    super(message);
    this.name = "LoginFailedError";
  }
}

export class Authenticator {
  private readonly session: HttpSession;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly follower: RedirectFollower;

  constructor(deps: AuthenticatorDeps) {
    this.session = deps.session;
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.follower =
      deps.follower ??
      (deps.config.redirectMode === "simple"
        ? new SimpleRedirectFollower(deps.session, deps.logger)
        : new StrictRedirectFollower(deps.session, deps.config, deps.logger, () => this.verifySession()));
  }

  get redirectMode(): RedirectFollower["mode"] {
    return this.follower.mode;
  }

  /** Resolves to false on every failure, including network and decode errors. */
  async login(credentials: Credentials): Promise<boolean> {
    const stopTimer = this.metrics.startTimer("login_ms");
    try {
      const ok = await this.performLogin(credentials);
      this.logger.info(ok ? "auth_login_ok" : "auth_login_failed", {
        redirectMode: this.follower.mode,
        durationMs: stopTimer(),
      });
      return ok;
    } catch (error) {
      this.logger.error("auth_login_error", {
        redirectMode: this.follower.mode,
        durationMs: stopTimer(),
        error: errorMessage(error),
      });
      return false;
    }
  }

  /** Re-fetches the site root and checks it for the logged-in marker. */
  async verifySession(): Promise<boolean> {
    await sleep(this.config.loginSettleMs);
    const rootUrl = this.siteUrl("/");
    const response = await this.session.get(rootUrl);
    if (response.status !== 200) {
      await response.body?.cancel();
      this.logger.error("auth_verify_bad_status", { url: rootUrl, status: response.status });
      return false;
    }

    const html = await response.text();
    const match = findLoginMarker(html, this.config.loggedInMarker);
    if (match === "none") {
      this.logger.debug("auth_verify_marker_missing", { url: rootUrl, marker: this.config.loggedInMarker });
      return false;
    }

    this.logger.info("auth_verify_ok", { url: rootUrl, match });
    return true;
  }

  private async performLogin(credentials: Credentials): Promise<boolean> {
    await this.session.clearCookies();
    const rootUrl = this.siteUrl("/");
    const seed = await this.session.get(rootUrl);
    await seed.body?.cancel();
    this.logger.debug("auth_seed_cookies", { url: rootUrl, status: seed.status, cookies: await this.session.cookieNames(rootUrl) });

    const loginUrl = this.siteUrl(this.config.loginPath);
    const origin = new URL(this.config.baseUrl).origin;
    const response = await this.session.postForm(
      loginUrl,
      {
        username: credentials.username,
        password: credentials.password,
        redirect_to: this.config.postLoginRedirect,
      },
      {
        headers: {
          accept: "application/json, text/javascript, */*; q=0.01",
          "accept-encoding": "gzip, deflate, br",
          origin,
          referer: `${origin}/`,
          "x-requested-with": "XMLHttpRequest",
        },
      },
    );

    this.logger.info("auth_login_response", { url: loginUrl, status: response.status });
    const text = await response.text();
    if (response.status !== 200) {
      this.logger.error("auth_login_bad_status", { url: loginUrl, status: response.status, body: text.slice(0, 500) });
      return false;
    }

    let result: LoginResult;
    try {
      result = parseLoginResponse(JSON.parse(text));
    } catch (error) {
      this.logger.error("auth_login_invalid_json", { url: loginUrl, error: errorMessage(error), body: text.slice(0, 500) });
      return false;
    }

    if (!result.success || !result.redirectUrl) {
      this.logger.error("auth_login_rejected", { url: loginUrl, success: result.success, body: text.slice(0, 500) });
      return false;
    }

    this.logger.debug("auth_cookie_redirect", { url: result.redirectUrl, redirectMode: this.follower.mode });
    return this.follower.follow(result.redirectUrl);
  }

  private siteUrl(pathname: string): string {
    return new URL(pathname, this.config.baseUrl).toString();
  }
}
