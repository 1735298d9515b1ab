/**
 * Inline body injection for generated verbs.
 *
 * Verb templates mark the body of `execute` with a pair of region comments:
 *
 *     // #region execute
 *     ...default body...
 *     // #endregion execute
 *
 * Injection replaces the lines between the markers and keeps the markers.
 */

const REGION_START = /^([ \t]*)\/\/ #region execute[ \t]*$/;
const REGION_END = /^[ \t]*\/\/ #endregion execute[ \t]*$/;

export interface InjectionResult {
  content: string;
  injected: boolean;
}

export function injectExecuteBody(content: string, body: string): InjectionResult {
  const lines = content.split('\n');
  const start = lines.findIndex((line) => REGION_START.test(line));
  if (start === -1) {
    return { content, injected: false };
  }
  const relativeEnd = lines.slice(start + 1).findIndex((line) => REGION_END.test(line));
  if (relativeEnd === -1) {
    return { content, injected: false };
  }
  const end = start + 1 + relativeEnd;

  const indent = REGION_START.exec(lines[start])?.[1] ?? '';
  const bodyLines = dedent(body)
    .split('\n')
    .map((line) => (line.trim() ? `${indent}${line}` : ''));

  return {
    content: [...lines.slice(0, start + 1), ...bodyLines, ...lines.slice(end)].join('\n'),
    injected: true,
  };
}

/**
 * Strip the indentation common to all non-blank lines and surrounding blank
 * lines.
 */
function dedent(text: string): string {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  while (lines.length > 0 && !lines[0].trim()) lines.shift();
  while (lines.length > 0 && !lines[lines.length - 1].trim()) lines.pop();

  const widths = lines
    .filter((line) => line.trim())
    .map((line) => line.length - line.trimStart().length);
  const common = widths.length > 0 ? Math.min(...widths) : 0;
  return lines.map((line) => line.slice(common)).join('\n');
}
