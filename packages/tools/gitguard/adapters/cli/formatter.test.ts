import { expect, test } from "vitest";
import {
  formatAudit,
  formatCheckpointList,
  formatExplanation,
  formatPlan,
  formatRunSummary,
} from "./formatter.ts";
import { parseYesNo } from "./terminal-interaction.ts";
import type { RunOutput } from "../../types.ts";

test("formatPlan - title, summary, risk and commands", () => {
  const text = formatPlan(
    {
      risk: "medium",
      summary: "Commit and push",
      commands: ['git commit -m "x"', "git push"],
    },
    "Proposed Execution Plan",
  );

  expect(text).toBe(
    [
      "== Proposed Execution Plan ==",
      "",
      "Interpreted Action:",
      "  • Commit and push",
      "",
      "Risk Level: MEDIUM",
      "",
      "Planned Commands:",
      '  $ git commit -m "x"',
      "  $ git push",
    ].join("\n"),
  );
});

test("formatCheckpointList - empty ledger", () => {
  expect(formatCheckpointList({ checkpoints: [] })).toBe("No checkpoints");
});

test("formatCheckpointList - marks the latest and shows snapshots", () => {
  const text = formatCheckpointList({
    checkpoints: [
      {
        reference: "gitguard-backup-20240102_090000-2",
        createdAt: "20240102_090000",
        uncommittedSnapshot: "0123456789abcdef",
      },
      {
        reference: "gitguard-backup-20240101_120000",
        createdAt: "20240101_120000",
        uncommittedSnapshot: null,
      },
    ],
  });

  expect(text.split("\n")).toEqual([
    "* gitguard-backup-20240102_090000-2  20240102_090000  +changes 0123456",
    "  gitguard-backup-20240101_120000    20240101_120000",
  ]);
});

const BASE_RUN: RunOutput = {
  outcome: "succeeded",
  attempts: 1,
  history: ["git push"],
  checkpoint: null,
  rolledBack: false,
  lastError: null,
};

test("formatRunSummary - nothing for successful runs", () => {
  expect(formatRunSummary(BASE_RUN)).toBeNull();
  expect(formatRunSummary({ ...BASE_RUN, outcome: "declined" })).toBeNull();
});

test("formatRunSummary - history, failure and kept checkpoint", () => {
  const text = formatRunSummary({
    ...BASE_RUN,
    outcome: "exhausted_max_attempts",
    attempts: 3,
    history: ["git fetch", "git push"],
    checkpoint: {
      reference: "gitguard-backup-20240101_120000",
      createdAt: "20240101_120000",
      uncommittedSnapshot: null,
    },
    lastError: {
      kind: "non_zero_exit",
      command: "git push",
      index: 0,
      exitCode: 1,
      stderr: "rejected\n",
    },
  });

  expect(text).toBe(
    [
      "Commands run in this session:",
      "  $ git fetch",
      "  $ git push",
      "Last failure: git push",
      "  rejected",
      "Checkpoint kept: gitguard-backup-20240101_120000 (restore with: gitguard rollback)",
    ].join("\n"),
  );
});

test("formatRunSummary - omits the checkpoint after a rollback", () => {
  const text = formatRunSummary({
    ...BASE_RUN,
    outcome: "fix_declined",
    checkpoint: {
      reference: "gitguard-backup-20240101_120000",
      createdAt: "20240101_120000",
      uncommittedSnapshot: null,
    },
    rolledBack: true,
  });

  expect(text).toBe("Commands run in this session:\n  $ git push");
});

test("formatAudit - issues or a clean bill", () => {
  expect(formatAudit({ passed: true, severity: "NONE", issues: [] })).toBe(
    "Audit Result: NONE\n- No issues found",
  );
  expect(
    formatAudit({ passed: false, severity: "HIGH", issues: ["Secret", "TODO"] }),
  ).toBe("Audit Result: HIGH\n- Secret\n- TODO");
});

test("formatExplanation - summary and key changes", () => {
  expect(
    formatExplanation({ summary: "Refactor", keyChanges: ["Split module"] }),
  ).toBe("Refactor\n\nKey Changes:\n- Split module");
});

test("parseYesNo - answers, defaults and garbage", () => {
  expect(parseYesNo("y", false)).toBe(true);
  expect(parseYesNo(" YES ", false)).toBe(true);
  expect(parseYesNo("n", true)).toBe(false);
  expect(parseYesNo("No", true)).toBe(false);
  expect(parseYesNo("", true)).toBe(true);
  expect(parseYesNo(null, false)).toBe(false);
  expect(parseYesNo("maybe", true)).toBeNull();
});
