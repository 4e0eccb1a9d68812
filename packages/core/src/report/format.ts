import { writeFile } from "fs/promises";
import { formatCalendarDate } from "../records/dates";
import type { AnswerSet } from "../stats/types";

export type ReportFormat = "text" | "json";

export type AnswerJson = Record<string, unknown>;

export function formatReport(answers: AnswerSet): string {
  const lines: string[] = [];
  const writeln = (...parts: Array<string | number | undefined>) =>
    lines.push(parts.map(display).join(" "));

  writeln("1. Number of different books:", answers[1]);
  writeln("2. Book with most ISBNs:", answers[2].title, `(${answers[2].count} ISBNs)`);
  writeln("3. Books without Goodreads ID:", answers[3]);
  writeln("4. Books with more than one author:", answers[4]);
  writeln("5. Books per publisher:");
  for (const { publisher, count } of answers[5]) {
    writeln(`   - ${publisher}: ${count}`);
  }
  writeln("6. Median number of pages:", answers[6]);
  writeln("7. Month with most published books:", answers[7].month, `(${answers[7].count} books)`);
  writeln(
    "8. Longest word length:",
    answers[8].length,
    "Words:",
    formatList(answers[8].words)
  );
  writeln("   Appears in titles:", formatList(answers[8].titles));
  writeln(
    "9. Most recently published book:",
    answers[9].title,
    "-",
    answers[9].date ? formatCalendarDate(answers[9].date) : undefined
  );
  writeln("10. Year of most updated entry:", answers[10]);
  writeln("11. Second book for top author:", answers[11]);
  const pair = answers[12].pair;
  writeln(
    "12. Top (publisher, author) pair:",
    pair ? `(${pair.publisher}, ${pair.author})` : undefined,
    `(${answers[12].count} books)`
  );

  return `${lines.join("\n")}\n`;
}

export function answersToJson(answers: AnswerSet): AnswerJson {
  const latest = answers[9];
  const pair = answers[12].pair;
  return {
    "1": answers[1],
    "2": { title: answers[2].title ?? null, count: answers[2].count },
    "3": answers[3],
    "4": answers[4],
    "5": answers[5],
    "6": answers[6] ?? null,
    "7": { month: answers[7].month ?? null, count: answers[7].count },
    "8": answers[8],
    "9": {
      title: latest.title ?? null,
      date: latest.date ? formatCalendarDate(latest.date) : null,
    },
    "10": answers[10] ?? null,
    "11": answers[11] ?? null,
    "12": {
      publisher: pair?.publisher ?? null,
      author: pair?.author ?? null,
      count: answers[12].count,
    },
  };
}

export function renderAnswers(answers: AnswerSet, format: ReportFormat): string {
  if (format === "json") return `${JSON.stringify(answersToJson(answers), null, 2)}\n`;
  return formatReport(answers);
}

export async function writeReport(
  filePath: string,
  answers: AnswerSet,
  format: ReportFormat = "text"
): Promise<void> {
  await writeFile(filePath, renderAnswers(answers, format), "utf8");
}

function display(value: string | number | undefined): string {
  return value === undefined ? "None" : String(value);
}

function formatList(values: string[]): string {
  return `[${values.map((value) => `'${value}'`).join(", ")}]`;
}
