// utils/logColors.ts

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",

  // headers / sections
  section: "\x1b[36m", // cyan
  sectionAlt: "\x1b[35m", // magenta

  // actions (meaning)
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  processing: "\x1b[35m",

  // subjects (data)
  subject: "\x1b[90m", // light gray (NOT white)
};

export type LogAction = "success" | "warn" | "error" | "processing";

/**
log semantic
 [SECTION]:
  [subject]
    [Action]: [detail]
*/
export function logSection(
  silent: boolean,
  section: string,
  subject: string,
  entries: ReadonlyArray<{ action: LogAction; label: string; detail?: string }>
): void {
  if (silent) return;

  const write = entries.some((e) => e.action === "error")
    ? console.error
    : console.log;

  write(`${colors.section}${colors.bold}${section}:${colors.reset}`);
  write(`  ${colors.subject}${subject}${colors.reset}`);

  for (const entry of entries) {
    const detail = entry.detail
      ? ` ${colors.subject}${entry.detail}${colors.reset}`
      : "";
    write(`    ${colors[entry.action]}${entry.label}:${colors.reset}${detail}`);
  }
}
