/**
 * sublisp help - language reference by topic
 */
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";
import { getOperatorTable } from "@sublisp/std";
import { render } from "@sublisp/core";

export { QUICKREF };

type HelpPage = { ok: true; text: string } | { ok: false; lines: string[] };

/** Exact topic name first, then a prefix that names exactly one topic. */
function resolveTopic(topic: string): string | undefined {
  const wanted = topic.toLowerCase().trim();
  const candidates = TOPIC_LIST.filter((name) => name === wanted || name.startsWith(wanted));
  return candidates.find((name) => name === wanted) ?? (candidates.length === 1 ? candidates[0] : undefined);
}

function operatorIndex(): string {
  const rows = [...getOperatorTable()].map(([name, term]) => ({ name, term: render(term) }));
  const width = Math.max(...rows.map((row) => row.name.length));
  return [
    "SUBLISP OPERATOR INDEX",
    "======================",
    "",
    ...rows.map((row) => `  ${row.name.padEnd(width)}  ${row.term}`),
    "",
    `Total: ${rows.length}`,
  ].join("\n");
}

function helpPage(topic: string | undefined, index: boolean): HelpPage {
  const resolved = topic === undefined ? undefined : resolveTopic(topic);

  if (index) {
    return resolved === "operators"
      ? { ok: true, text: operatorIndex() }
      : {
          ok: false,
          lines: [
            "The --index flag is only supported with the operators topic.",
            "Usage:",
            "  sublisp help operators --index",
          ],
        };
  }

  if (topic === undefined) return { ok: true, text: QUICKREF };
  if (resolved !== undefined) return { ok: true, text: TOPICS[resolved] };

  return {
    ok: false,
    lines: [
      `Unknown help topic: "${topic}"`,
      "Available topics:",
      ...TOPIC_LIST.map((name) => `  - ${name}`),
      "Usage:",
      "  sublisp help <topic>",
      "  sublisp help operators --index",
    ],
  };
}

export function runHelp(topic?: string, opts: { index?: boolean } = {}): void {
  const page = helpPage(topic, !!opts.index);
  if (page.ok) {
    console.log(page.text);
    return;
  }
  for (const line of page.lines) console.error(line);
  process.exitCode = 1;
}
