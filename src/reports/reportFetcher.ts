/**
 * Report fetcher: one ReportRequest → the CSV and PDF exports of both
 * sections, downloaded through the portal session.
 *
 * Each download is retried on TransientFetchError with exponential backoff.
 * AuthError and anything else propagate on the first failure; the session
 * manager deals with expired sessions, not the fetcher.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { TransientFetchError, describeError } from "../errors.ts";
import type { PortalSession } from "../portal/types.ts";
import { trace } from "../utils/tracer.ts";
import { withRetry } from "../utils/retry.ts";
import {
  REPORT_SECTIONS,
  type DateRange,
  type DownloadedFile,
  type RawReport,
  type ReportFormat,
  type ReportRequest,
  type ReportSection,
} from "./types.ts";

const FORMATS: readonly ReportFormat[] = ["csv", "pdf"];

export interface ReportFetcherOptions {
  downloadDir: string;
  maxAttempts: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/** arrivals_20261020.csv, or arrivals_20261020-20261026.pdf for a multi-day range */
export function auditFileName(section: ReportSection, format: ReportFormat, range: DateRange): string {
  const compact = (d: string) => d.replace(/-/g, "");
  const span = range.from === range.to ? compact(range.from) : `${compact(range.from)}-${compact(range.to)}`;
  return `${section}_${span}.${format}`;
}

export class ReportFetcher {
  constructor(
    private readonly portal: PortalSession,
    private readonly options: ReportFetcherOptions
  ) {}

  async fetch(request: ReportRequest): Promise<RawReport> {
    const files: DownloadedFile[] = [];

    try {
      for (const section of REPORT_SECTIONS) {
        for (const format of FORMATS) {
          files.push(await this.download(request, section, format));
        }
      }
    } catch (error) {
      await this.captureFailure(request);
      throw error;
    }

    console.log(`[fetcher] ${request.reportType} report for ${request.range.label}: ${files.length} files`);
    return { request, files };
  }

  private async download(
    request: ReportRequest,
    section: ReportSection,
    format: ReportFormat
  ): Promise<DownloadedFile> {
    const label = `${section} ${format}`;
    const data = await withRetry(
      (attempt) => {
        console.log(`[fetcher] Downloading ${label} (attempt ${attempt}/${this.options.maxAttempts})`);
        return this.portal.navigateAndDownload(section, format, request.range);
      },
      {
        attempts: this.options.maxAttempts,
        backoffMs: this.options.backoffMs,
        shouldRetry: (error) => error instanceof TransientFetchError,
        onRetry: (error, attempt, delayMs) => {
          console.warn(`[fetcher] ${label} attempt ${attempt} failed: ${describeError(error)}; retrying in ${delayMs}ms`);
          trace({
            event: "fetch_retry",
            kind: request.reportType,
            section,
            format,
            attempt,
            error: describeError(error),
          });
        },
        sleep: this.options.sleep,
      }
    );

    const fileName = auditFileName(section, format, request.range);
    return { section, format, fileName, data, savedPath: await this.saveAudit(fileName, data) };
  }

  /** Audit copy; failure is logged and the pipeline carries on. */
  private async saveAudit(fileName: string, data: Buffer): Promise<string | null> {
    const path = join(this.options.downloadDir, fileName);
    try {
      await mkdir(this.options.downloadDir, { recursive: true });
      await writeFile(path, data);
      return path;
    } catch (error) {
      console.warn(`[fetcher] Could not save audit copy ${path}: ${describeError(error)}`);
      return null;
    }
  }

  private async captureFailure(request: ReportRequest): Promise<void> {
    const stamp = (this.options.now?.() ?? new Date()).toISOString().replace(/[:.]/g, "-");
    const path = join(this.options.downloadDir, `error_${request.reportType}_${stamp}.png`);
    try {
      await mkdir(this.options.downloadDir, { recursive: true });
      await this.portal.screenshot(path);
      console.log(`[fetcher] Failure screenshot saved to ${path}`);
    } catch (error) {
      console.warn(`[fetcher] Could not capture failure screenshot: ${describeError(error)}`);
    }
  }
}
