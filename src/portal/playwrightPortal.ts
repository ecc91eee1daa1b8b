/**
 * Portal session over a Playwright browser context.
 *
 * One browser, one context, one working page. open() replaces the context
 * wholesale; report previews open in a second tab which is always closed
 * before the call returns. Playwright failures are mapped onto the relay's
 * error taxonomy: a bounce to the sign-in flow is an AuthError, everything
 * else (timeouts, navigation, missing elements) is a TransientFetchError.
 *
 * Uses playwright-core against an installed Chrome (BROWSER_CHANNEL) or an
 * explicit BROWSER_EXECUTABLE_PATH; no browser is downloaded.
 */

import { readFile } from "fs/promises";
import { chromium, type Browser, type BrowserContext, type Frame, type Page } from "playwright-core";
import { AuthError, RelayError, TransientFetchError, describeError } from "../errors.ts";
import type { PortalCredentials } from "../config/settings.ts";
import type { DateRange, ReportFormat, ReportSection } from "../reports/types.ts";
import { storageStateSchema, type StorageState } from "../session/sessionState.ts";
import {
  EXPORT_FORMAT_TEXT,
  REPORT_LINK_TEXT,
  SELECTORS,
  SIGN_IN_MARKERS,
  TOMORROW_TEXT,
  VIEWPORT,
} from "./selectors.ts";
import type { LoginMode, OperatorPrompt, PortalSession } from "./types.ts";

export interface PlaywrightPortalOptions {
  dashboardUrl: string;
  reportListUrl: string;
  credentials: PortalCredentials | null;
  headless: boolean;
  browserChannel: string | null;
  executablePath: string | null;
  stepTimeoutMs: number;
  operator: OperatorPrompt;
}

/** True when the URL belongs to the hosted sign-in flow rather than the portal. */
export function isSignInUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return SIGN_IN_MARKERS.some((marker) => lower.includes(marker));
}

/** YYYY-MM-DD → DD/MM/YYYY, the portal's date input format. */
export function formatPortalDate(isoDate: string): string {
  const [year, month, day] = isoDate.split("-");
  return `${day}/${month}/${year}`;
}

export class PlaywrightPortal implements PortalSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(private readonly options: PlaywrightPortalOptions) {}

  async open(state: StorageState | null): Promise<void> {
    await this.closeContext();

    if (!this.browser) {
      this.browser = await this.step("launch browser", () =>
        chromium.launch({
          headless: this.options.headless,
          channel: this.options.browserChannel ?? undefined,
          executablePath: this.options.executablePath ?? undefined,
          args: ["--disable-blink-features=AutomationControlled"],
        })
      );
      console.log(`[portal] Browser launched (${this.options.headless ? "headless" : "headed"})`);
    }

    const browser = this.browser;
    const context = await this.step("create context", () =>
      browser.newContext({
        storageState: state ?? undefined,
        acceptDownloads: true,
        viewport: VIEWPORT,
      })
    );
    context.setDefaultTimeout(this.options.stepTimeoutMs);
    context.setDefaultNavigationTimeout(this.options.stepTimeoutMs);
    this.context = context;
    this.page = await this.step("open page", () => context.newPage());
  }

  async login(mode: LoginMode): Promise<void> {
    if (mode === "interactive" && this.options.headless) {
      throw new AuthError("Interactive login needs a headed browser; restart without --headless or configure credentials");
    }
    if (mode === "credentials" && !this.options.credentials) {
      throw new AuthError("Credential login requested but PORTAL_USERNAME/PORTAL_PASSWORD are not set");
    }

    // A fresh login always starts from an empty context
    await this.open(null);
    const page = this.requirePage();

    await this.step("open dashboard", () => page.goto(this.options.dashboardUrl, { waitUntil: "domcontentloaded" }));
    if (!isSignInUrl(page.url())) {
      console.log("[portal] Already signed in");
      return;
    }

    if (mode === "credentials" && this.options.credentials) {
      const { username, password } = this.options.credentials;
      console.log("[portal] Signing in with configured credentials...");
      await this.step("fill username", () => page.locator(SELECTORS.username).first().fill(username));
      await this.step("fill password", () => page.locator(SELECTORS.password).first().fill(password));
      await this.step("submit sign-in", () => page.locator(SELECTORS.submit).first().click());
      try {
        await page.waitForURL((url) => !isSignInUrl(url.toString()), { timeout: this.options.stepTimeoutMs });
      } catch (error) {
        throw new AuthError("Sign-in did not reach the portal; check PORTAL_USERNAME/PORTAL_PASSWORD", { cause: error });
      }
    } else {
      await this.options.operator.waitForConfirmation(
        "Log in to the portal in the browser window, then press ENTER here to continue."
      );
    }

    if (isSignInUrl(page.url())) {
      throw new AuthError(`Still on the sign-in page after login (${page.url()})`);
    }
    console.log("[portal] Signed in");
  }

  async isAlive(): Promise<boolean> {
    const page = this.requirePage();
    await this.step("heartbeat", () => page.goto(this.options.dashboardUrl, { waitUntil: "domcontentloaded" }));
    return !isSignInUrl(page.url());
  }

  async navigateAndDownload(
    section: ReportSection,
    format: ReportFormat,
    range: DateRange
  ): Promise<Buffer> {
    const page = this.requirePage();
    const context = this.requireContext();

    await this.step("open report list", () =>
      page.goto(this.options.reportListUrl, { waitUntil: "domcontentloaded" })
    );
    if (isSignInUrl(page.url())) {
      throw new AuthError("Redirected to sign-in while opening the report list");
    }

    await this.step(`open ${section} report`, () =>
      page.getByText(REPORT_LINK_TEXT[section], { exact: true }).first().click()
    );

    if (range.preset === "tomorrow") {
      await this.step("select tomorrow", () => page.getByText(TOMORROW_TEXT, { exact: true }).first().click());
    } else {
      await this.step("enter date range", async () => {
        await page.locator(SELECTORS.dateFrom).fill(formatPortalDate(range.from));
        await page.locator(SELECTORS.dateTo).fill(formatPortalDate(range.to));
      });
    }

    // Preview opens the rendered report in a new tab
    const [preview] = await this.step("open preview", () =>
      Promise.all([context.waitForEvent("page"), page.locator(SELECTORS.previewButton).click()])
    );

    try {
      await this.step("load preview", () => preview.waitForLoadState("networkidle"));
      await this.clickVisibleExport(preview);
      const [download] = await this.step(`export ${format}`, () =>
        Promise.all([
          preview.waitForEvent("download"),
          preview.getByText(EXPORT_FORMAT_TEXT[format], { exact: true }).first().click(),
        ])
      );
      const file = await this.step("save download", () => download.path());
      if (!file) {
        throw new TransientFetchError(`Download of ${section} ${format} produced no file`);
      }
      return await readFile(file);
    } finally {
      await preview.close().catch((error: unknown) => {
        console.warn(`[portal] Could not close preview tab: ${describeError(error)}`);
      });
    }
  }

  async exportState(): Promise<StorageState> {
    const context = this.requireContext();
    const state = await this.step("export storage state", () => context.storageState());
    return storageStateSchema.parse(state);
  }

  async screenshot(path: string): Promise<void> {
    if (!this.page) return;
    await this.page.screenshot({ path, fullPage: true });
  }

  async recordNavigation(listener: (url: string) => void): Promise<() => void> {
    const page = this.requirePage();
    const onNavigate = (frame: Frame) => {
      if (frame === page.mainFrame()) listener(frame.url());
    };
    page.on("framenavigated", onNavigate);
    await this.step("open dashboard", () => page.goto(this.options.dashboardUrl, { waitUntil: "domcontentloaded" }));
    return () => {
      page.off("framenavigated", onNavigate);
    };
  }

  async close(): Promise<void> {
    await this.closeContext();
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      console.log("[portal] Browser closed");
    }
  }

  // ──────────────────────────────────────────────
  // internals
  // ──────────────────────────────────────────────

  private async closeContext(): Promise<void> {
    if (this.context) {
      await this.context.close();
    }
    this.context = null;
    this.page = null;
  }

  private requirePage(): Page {
    if (!this.page) throw new AuthError("No portal session is open");
    return this.page;
  }

  private requireContext(): BrowserContext {
    if (!this.context) throw new AuthError("No portal session is open");
    return this.context;
  }

  /** There are often two export buttons (top and bottom toolbars); click the visible one. */
  private async clickVisibleExport(preview: Page): Promise<void> {
    await this.step("open export menu", async () => {
      const buttons = preview.locator(SELECTORS.exportButton);
      const count = await buttons.count();
      for (let i = 0; i < count; i++) {
        if (await buttons.nth(i).isVisible()) {
          await buttons.nth(i).click();
          return;
        }
      }
      if (count > 0) {
        console.warn("[portal] No visible export button, forcing the first one");
        await buttons.first().click({ force: true });
      } else {
        await preview.locator(SELECTORS.exportMenuFallback).click({ force: true });
      }
    });
  }

  /** Run one bounded portal step, translating failures into relay errors. */
  private async step<T>(label: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof RelayError) throw error;
      throw new TransientFetchError(`Portal step "${label}" failed: ${describeError(error)}`, { cause: error });
    }
  }
}
