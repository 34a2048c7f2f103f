// src/report-formatter.ts — Human-readable and JSON renderings of run reports

import type {
  CappedList,
  CheckClass,
  GenerationReport,
  ParseFailure,
  SectionRef,
  ValidationFinding,
  ValidationReport,
} from "./types.js";
import { CHECK_CLASSES } from "./types.js";

export function formatGenerationReport(report: GenerationReport): string {
  const lines: string[] = [];
  const mode = report.dryRun ? " (dry run, nothing written)" : "";
  lines.push(`Generated map ${report.mapRoot} from ${report.sourceRoot}${mode}`);

  pushList(lines, "Created files", report.createdFiles, (f) => f);
  pushList(lines, "Updated files", report.updatedFiles, (f) => f);
  pushList(lines, "New sections", report.newSections, formatSectionRef);
  pushList(lines, "Removed sections", report.removedSections, formatSectionRef);
  pushList(lines, "Unfilled placeholders", report.unfilledPlaceholders, formatSectionRef);
  pushList(lines, "Orphaned documents", report.orphanedDocuments, (f) => f);
  pushList(lines, "Missing descriptions", report.missingDescriptions, (f) => f);
  pushList(lines, "Parse errors", report.parseErrors, formatParseFailure);

  if (lines.length === 1) lines.push("No changes.");
  return lines.join("\n");
}

export function formatValidationReport(report: ValidationReport): string {
  const lines: string[] = [];
  const { documents, crossRefs, codeRefs } = report.checked;
  lines.push(
    `Validated ${report.mapRoot}: ${documents} documents, ${crossRefs} links, ${codeRefs} code links`,
  );

  if (report.ok) {
    lines.push("OK: no findings.");
    return lines.join("\n");
  }

  for (const checkClass of CHECK_CLASSES) {
    const findings = report.findings.filter((f) => f.checkClass === checkClass);
    if (findings.length === 0) continue;
    lines.push("", `${CLASS_TITLES[checkClass]} (${findings.length})`);
    for (const finding of findings) {
      lines.push(`  ${formatFinding(finding)}`);
      for (const location of finding.locations ?? []) {
        lines.push(`    - ${location}`);
      }
    }
  }

  const summary = CHECK_CLASSES.filter((c) => report.counts[c] > 0)
    .map((c) => `${report.counts[c]} ${c}`)
    .join(", ");
  lines.push("", `FAILED: ${report.findings.length} findings (${summary})`);
  return lines.join("\n");
}

/**
 * JSON rendering for --json. Stable key order follows the report types.
 */
export function formatJson(report: GenerationReport | ValidationReport): string {
  return JSON.stringify(report, null, 2);
}

const CLASS_TITLES: Record<CheckClass, string> = {
  structure: "Structure",
  "file-link": "Broken file links",
  "code-link": "Broken code links",
  size: "Size limits",
  anchor: "Anchors",
};

function formatFinding(finding: ValidationFinding): string {
  const where = finding.line > 0 ? `${finding.document}:${finding.line}` : finding.document;
  return `${where}  ${finding.message}`;
}

function formatSectionRef(ref: SectionRef): string {
  return `${ref.document}  ${ref.identifier} (${ref.source}:${ref.line})`;
}

function formatParseFailure(failure: ParseFailure): string {
  return `${failure.file}: ${failure.message}`;
}

function pushList<T>(
  lines: string[],
  title: string,
  list: CappedList<T>,
  render: (item: T) => string,
): void {
  if (list.total === 0) return;
  lines.push(`${title} (${list.total}):`);
  for (const item of list.items) lines.push(`  ${render(item)}`);
  if (list.total > list.items.length) {
    lines.push(`  ... and ${list.total - list.items.length} more`);
  }
}
