import { GCS_URL_BASENAME } from "./naming.js";

export type CoverageUploadKind = "reports" | "fuzzer_stats" | "logs" | "srcmap";

export const LATEST_REPORT_INFO_CONTENT_TYPE = "application/json";

/** Addresses for one project's coverage run on one report date. */
export class CoverageUrls {
  readonly bucket: string;
  readonly htmlReportUrl: string;
  /** Always the newest report; not stamped with a date. */
  readonly latestReportInfoPath: string;

  constructor(
    readonly project: string,
    readonly date: string,
    readonly platform: string,
    opts: { baseBucket: string; testing: boolean },
  ) {
    this.bucket = opts.testing ? `${opts.baseBucket}-testing` : opts.baseBucket;
    this.htmlReportUrl = `${GCS_URL_BASENAME}${this.bucket}/${project}/reports/${date}/${platform}/index.html`;
    this.latestReportInfoPath = `/${opts.baseBucket}/latest_report_info/${project}.json`;
  }

  uploadUrl(kind: CoverageUploadKind): string {
    return `gs://${this.bucket}/${this.project}/${kind}/${this.date}`;
  }

  srcmapUrl(): string {
    return this.uploadUrl("srcmap").replace(/\/+$/, "") + ".json";
  }

  reportSummaryPath(): string {
    return `${this.uploadUrl("reports")}/${this.platform}/summary.json`;
  }
}
