/**
 * Clean up raw OCR text and render it as page Markdown.
 */

export function postProcessText(text: string): string {
  const lines = text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim());

  // Re-join words hyphenated across a line break: "docu-" + "ment"
  const joined: string[] = [];
  for (const line of lines) {
    const prev = joined[joined.length - 1];
    if (prev !== undefined && /[A-Za-z]-$/.test(prev) && /^[a-z]/.test(line)) {
      joined[joined.length - 1] = prev.slice(0, -1) + line;
    } else {
      joined.push(line);
    }
  }

  return joined.join("\n").replace(/\n{3,}/g, "\n\n").trim();
}

export function toPageMarkdown(text: string, pageNumber: number): string {
  const heading = `## Page ${pageNumber}`;
  return text ? `${heading}\n\n${text}\n` : `${heading}\n`;
}
