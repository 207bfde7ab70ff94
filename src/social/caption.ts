const DATE_FORMAT = new Intl.DateTimeFormat("en-US", {
  timeZone: "UTC",
  month: "long",
  day: "2-digit",
  year: "numeric"
});

/** "October 08, 2026" */
export function formatCaptionDate(d: Date): string {
  return DATE_FORMAT.format(d);
}

/**
 * Replace every `{date}` placeholder in the template with the UTC date of `at`.
 */
export function formatCaption(template: string, at: Date): string {
  return template.split("{date}").join(formatCaptionDate(at));
}
