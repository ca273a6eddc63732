/**
 * Publish evidence, written on pass AND fail:
 *   <workspace>/.audit/PUBLISH/
 *     publish-report.json
 *     publish-summary.md
 */
import fs from "node:fs";
import path from "node:path";
import { ConfigError, PublishError, type PublishErrorCode, type ValidationIssue } from "./errors";
import type { PublishResult } from "./pipeline";

export type PublishReport = {
  ok: boolean;
  dryRun: boolean;
  result: PublishResult;
  error?: {
    code: PublishErrorCode | "UNEXPECTED";
    message: string;
    issues?: ValidationIssue[];
  };
  files: {
    configPath: string;
    evidenceDir: string;
  };
  timingsMs: { total: number };
};

export function evidenceDirFor(workspace: string): string {
  return path.join(workspace, ".audit", "PUBLISH");
}

export function describeError(err: unknown): NonNullable<PublishReport["error"]> {
  if (err instanceof PublishError) {
    const issues = err instanceof ConfigError && err.issues.length > 0 ? err.issues : undefined;
    return { code: err.code, message: err.message, issues };
  }
  return { code: "UNEXPECTED", message: err instanceof Error ? err.message : String(err) };
}

export function makeSummaryMd(report: PublishReport): string {
  const { result } = report;
  const lines: string[] = [];
  lines.push(`# Container Publish`);
  lines.push(`- Result: **${report.ok ? (result.skipped ? "SKIPPED" : "PASS") : "FAIL"}**`);
  lines.push(`- Dry run: **${report.dryRun ? "true" : "false"}**`);
  lines.push(`- Mode: **${result.mode ?? "unknown"}**`);
  lines.push(`- Version: **${result.request?.version ?? "unresolved"}**`);
  lines.push(`- Tag: ${result.tag ? `\`${result.tag}\`` : "**none**"}`);
  lines.push(`- Pushed: **${result.pushed ? "true" : "false"}**`);
  if (result.skipReason) lines.push(`- Skipped: ${result.skipReason}`);
  lines.push(``);
  lines.push(`## Steps`);
  if (result.steps.length === 0) {
    lines.push(`- None`);
  } else {
    for (const s of result.steps) {
      lines.push(`- ${s.status === "success" ? "PASS" : "FAIL"} ${s.name} (${s.durationMs} ms)`);
      if (s.error) lines.push(`  - ${s.error}`);
    }
  }
  if (report.error) {
    lines.push(``);
    lines.push(`## Error`);
    lines.push(`- \`${report.error.code}\`: ${report.error.message}`);
    for (const issue of report.error.issues ?? []) {
      lines.push(`- **${issue.level.toUpperCase()}** \`${issue.code}\` at \`${issue.path}\`: ${issue.message}`);
      if (issue.suggestion) lines.push(`  - Suggestion: ${issue.suggestion}`);
    }
  }
  lines.push(``);
  lines.push(`## Files`);
  lines.push(`- Config: \`${report.files.configPath}\``);
  lines.push(`- Evidence dir: \`${report.files.evidenceDir}\``);
  lines.push(`- Total: ${report.timingsMs.total} ms`);
  lines.push(``);
  return lines.join("\n");
}

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, "utf8");
}

/** Returns the path of publish-report.json. */
export function writeEvidence(report: PublishReport): string {
  const reportPath = path.join(report.files.evidenceDir, "publish-report.json");
  writeFile(reportPath, JSON.stringify(report, null, 2));
  writeFile(path.join(report.files.evidenceDir, "publish-summary.md"), makeSummaryMd(report));
  return reportPath;
}
