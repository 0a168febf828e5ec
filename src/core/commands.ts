import { Authenticator, LoginFailedError } from "../auth";
import { AppConfig, Credentials } from "../config";
import { AssetResolver, createLocator, PresentationLocator } from "../crawl";
import { PdfDownloader } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { HttpSession } from "../session";
import { DownloadLedger } from "../store";
import { HarvestSummary, ListSummary } from "../types";
import { sleep } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  session: HttpSession;
  ledger: DownloadLedger;
  logger: Logger;
  metrics: MetricsRegistry;
  sleepFn?: (ms: number) => Promise<void>;
}

export interface HarvestComponents {
  authenticator: Pick<Authenticator, "login" | "redirectMode">;
  locator: PresentationLocator;
  resolver: Pick<AssetResolver, "resolvePdfUrl">;
  downloader: Pick<PdfDownloader, "downloadPdf">;
}

export function createHarvestComponents(ctx: CommandContext): HarvestComponents {
  const shared = { session: ctx.session, config: ctx.config, metrics: ctx.metrics };
  return {
    authenticator: new Authenticator({ ...shared, logger: ctx.logger.child("auth") }),
    locator: createLocator({ ...shared, logger: ctx.logger.child("locator") }),
    resolver: new AssetResolver({ ...shared, logger: ctx.logger.child("resolver") }),
    downloader: new PdfDownloader({
      ...shared,
      logger: ctx.logger.child("downloader"),
      ledger: ctx.ledger,
      sleepFn: ctx.sleepFn,
    }),
  };
}

async function ensureLoggedIn(
  ctx: CommandContext,
  authenticator: HarvestComponents["authenticator"],
  credentials: Credentials,
): Promise<void> {
  ctx.logger.info("login_start", { redirectMode: authenticator.redirectMode });
  if (!(await authenticator.login(credentials))) {
    ctx.logger.error("login_failed_aborting");
    throw new LoginFailedError(`Login to ${ctx.config.baseUrl} failed`);
  }
}

/**
 * Login, then page through search results until an empty page, resolving and downloading each
 * presentation's PDF in listing order. Only a failed login aborts the run.
 */
export async function runHarvest(
  ctx: CommandContext,
  credentials: Credentials,
  components: HarvestComponents = createHarvestComponents(ctx),
): Promise<HarvestSummary> {
  const { config, logger, metrics } = ctx;
  const pause = ctx.sleepFn ?? sleep;
  const { authenticator, locator, resolver, downloader } = components;
  const downloadLimit = config.testMode ? config.testModeDownloadLimit : undefined;

  await ensureLoggedIn(ctx, authenticator, credentials);
  logger.info("harvest_start", { strategy: locator.strategy, testMode: config.testMode, maxPages: config.maxPages });

  const summary: HarvestSummary = {
    authenticated: true,
    pagesVisited: 0,
    presentationsFound: 0,
    pdfLinksResolved: 0,
    skippedNoPdf: 0,
    downloaded: 0,
    failed: 0,
    stoppedBy: "max_pages",
  };
  const seenPresentations = new Set<string>();

  pages: for (let pageIndex = 1; pageIndex <= config.maxPages; pageIndex += 1) {
    const presentations = await locator.listPresentations(pageIndex);
    summary.pagesVisited += 1;
    if (presentations.length === 0) {
      logger.info("harvest_empty_page", { pageIndex });
      summary.stoppedBy = "empty_page";
      break;
    }

    const fresh = presentations.filter((url) => !seenPresentations.has(url));
    fresh.forEach((url) => seenPresentations.add(url));
    metrics.incrementCounter("presentations_found", fresh.length);
    summary.presentationsFound += fresh.length;
    logger.info("harvest_page", { pageIndex, found: presentations.length, fresh: fresh.length });

    for (const presentationUrl of fresh) {
      logger.info("harvest_presentation", { url: presentationUrl, pageIndex });
      const pdfUrl = await resolver.resolvePdfUrl(presentationUrl);
      if (!pdfUrl) {
        summary.skippedNoPdf += 1;
        logger.warn("harvest_no_pdf", { url: presentationUrl });
        continue;
      }
      summary.pdfLinksResolved += 1;

      if (!(await downloader.downloadPdf(pdfUrl))) {
        summary.failed += 1;
        logger.error("harvest_download_failed", { url: pdfUrl, presentationUrl });
        continue;
      }

      summary.downloaded += 1;
      logger.info("harvest_download_ok", { url: pdfUrl, presentationUrl, downloaded: summary.downloaded, limit: downloadLimit });
      if (downloadLimit !== undefined && summary.downloaded >= downloadLimit) {
        summary.stoppedBy = "test_mode_limit";
        break pages;
      }
      await pause(config.downloadDelayMs);
    }
  }

  if (summary.stoppedBy === "max_pages") {
    logger.warn("harvest_max_pages_reached", { maxPages: config.maxPages });
  }
  logger.info("harvest_complete", { ...summary });
  return summary;
}

/** Login and list a single search page without downloading anything. */
export async function runList(
  ctx: CommandContext,
  credentials: Credentials,
  pageIndex: number,
  components: HarvestComponents = createHarvestComponents(ctx),
): Promise<ListSummary> {
  await ensureLoggedIn(ctx, components.authenticator, credentials);
  const presentationUrls = await components.locator.listPresentations(pageIndex);
  for (const url of presentationUrls) {
    ctx.logger.info("list_presentation", { url, pageIndex });
  }
  ctx.logger.info("list_complete", { pageIndex, found: presentationUrls.length });
  return { pageIndex, presentationUrls };
}

export async function runStatus(ctx: CommandContext): Promise<number> {
  const recorded = await ctx.ledger.count();
  ctx.logger.info("status", { recorded, ledgerMode: ctx.config.ledgerMode, ledgerPath: ctx.config.ledgerPath });
  return recorded;
}
