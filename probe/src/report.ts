/**
 * Report Rendering
 *
 * Pure string builders: the CLI decides where the lines go. Rows follow the
 * run's pair order, which is the table's declaration order.
 */

import { PROBE_MODES, type ModelSpec, type ProbeMode, type ProbeResult, type RunResults } from "./types.js";

export const RULE_WIDTH = 85;
export const MODEL_COLUMN_WIDTH = 30;
export const SNIPPET_LENGTH = 80;

const MODE_TITLES: Record<ProbeMode, string> = {
  direct: "Direct (Bedrock API)",
  proxy: "CDN proxy"
};

// ============================================
// BANNER
// ============================================

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYY-MM-DD HH:mm:ss */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

export function renderBanner(proxyEndpoint: string, startedAt: Date): string[] {
  const title = "Bedrock CDN Proxy Connectivity Check";
  const innerWidth = 80;
  const left = Math.floor((innerWidth - title.length) / 2);
  const hr = "═".repeat(innerWidth);

  return [
    `╔${hr}╗`,
    `║${" ".repeat(left)}${title.padEnd(innerWidth - left)}║`,
    `╚${hr}╝`,
    "",
    `Proxy endpoint: ${proxyEndpoint}`,
    `Started:        ${formatTimestamp(startedAt)}`
  ];
}

// ============================================
// PROGRESS
// ============================================

export function truncateSnippet(text: string, length: number = SNIPPET_LENGTH): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

export function formatPairHeading(index: number, model: ModelSpec, region: string): string {
  return `[${index}] ${model.displayName} @ ${region}`;
}

export function formatProbeOutcome(mode: ProbeMode, result: ProbeResult): string[] {
  if (result.success) {
    return [
      `  [${mode}] OK (${formatSeconds(result.elapsedSeconds)})`,
      `      Response: ${truncateSnippet(result.responseSnippet)}`,
      `      Tokens: input=${result.tokenUsage.input}, output=${result.tokenUsage.output}`
    ];
  }
  return [
    `  [${mode}] FAIL (${result.errorKind})`,
    `      Error: ${result.errorMessage}`
  ];
}

// ============================================
// TABLE
// ============================================

function statusLabel(result: ProbeResult | undefined): string {
  return result?.success ? "OK" : "FAIL";
}

function formatRow(columns: [string, string, string, string, string]): string {
  const [model, region, direct, proxy, latency] = columns;
  return [
    model.slice(0, MODEL_COLUMN_WIDTH - 1).padEnd(MODEL_COLUMN_WIDTH),
    region.padEnd(20),
    direct.padEnd(10),
    proxy.padEnd(10),
    latency
  ].join(" ").trimEnd();
}

export function renderTable(results: RunResults): string[] {
  const lines = [
    formatRow(["Model", "Region", "Direct", "Proxy", "Latency"]),
    "-".repeat(RULE_WIDTH)
  ];

  for (const pair of results.pairs) {
    const direct = results.direct.get(pair.key);
    const proxy = results.proxy.get(pair.key);
    const latency = proxy?.success ? formatSeconds(proxy.elapsedSeconds) : "-";
    lines.push(formatRow([pair.model.displayName, pair.region, statusLabel(direct), statusLabel(proxy), latency]));
  }

  return lines;
}

// ============================================
// STATISTICS
// ============================================

export interface FailureDetail {
  key: string;
  errorKind: string;
  errorMessage: string;
}

export interface ModeStats {
  total: number;
  passed: number;
  failed: number;
  /** Whole percent */
  successRate: number;
  /** Mean over successful probes; null when none passed */
  averageElapsedSeconds: number | null;
  failures: FailureDetail[];
}

export function successRate(passed: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((passed / total) * 100);
}

export function computeModeStats(results: ReadonlyMap<string, ProbeResult>): ModeStats {
  let passed = 0;
  let elapsedTotal = 0;
  const failures: FailureDetail[] = [];

  for (const [key, result] of results) {
    if (result.success) {
      passed++;
      elapsedTotal += result.elapsedSeconds;
    } else {
      failures.push({ key, errorKind: result.errorKind, errorMessage: result.errorMessage });
    }
  }

  const total = results.size;
  return {
    total,
    passed,
    failed: total - passed,
    successRate: successRate(passed, total),
    averageElapsedSeconds: passed > 0 ? elapsedTotal / passed : null,
    failures
  };
}

export function renderSummary(results: RunResults): string[] {
  const lines = ["", "=".repeat(RULE_WIDTH), "Summary", "=".repeat(RULE_WIDTH)];

  for (const mode of PROBE_MODES) {
    const stats = computeModeStats(results[mode]);
    const average = stats.averageElapsedSeconds === null ? "-" : formatSeconds(stats.averageElapsedSeconds);
    lines.push(
      "",
      `${MODE_TITLES[mode]}:`,
      `  Passed: ${stats.passed}/${stats.total}`,
      `  Failed: ${stats.failed}/${stats.total}`,
      `  Success rate: ${stats.successRate}%`,
      `  Avg latency: ${average}`
    );
  }

  return lines;
}

export function renderFailures(results: RunResults): string[] {
  const lines: string[] = [];

  for (const mode of PROBE_MODES) {
    const { failures } = computeModeStats(results[mode]);
    if (failures.length === 0) continue;

    lines.push("", `Failure details (${mode}):`);
    for (const f of failures) {
      lines.push(`  - ${f.key}: ${f.errorKind}: ${f.errorMessage}`);
    }
  }

  return lines;
}

export function formatReport(results: RunResults): string[] {
  return [
    "",
    ...renderTable(results),
    ...renderSummary(results),
    ...renderFailures(results)
  ];
}
