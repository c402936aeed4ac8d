import { expect, test } from "vitest";
import { CleanCheckpointsUseCase } from "./clean-checkpoints.ts";
import { ListCheckpointsUseCase } from "./list-checkpoints.ts";
import {
  type Checkpoint,
  isCheckpointReference,
} from "../../entities/checkpoint.ts";
import type { Interaction } from "../../ports/interaction.ts";
import { InMemoryGitService } from "../../../adapters/git/in-memory-git.ts";
import { InMemoryFileSystem } from "../../../adapters/filesystem/in-memory-fs.ts";
import { JsonCheckpointStore } from "../../../adapters/repositories/json-checkpoint-store.ts";
import { MemoryLogger } from "../../../adapters/logging/memory-logger.ts";

const LEDGER = "/repo/.git/gitguard/checkpoints.json";

function createMockInteraction(answer: boolean): Interaction & {
  questions: string[];
} {
  const questions: string[] = [];
  return {
    questions,
    confirm(message: string) {
      questions.push(message);
      return Promise.resolve(answer);
    },
    ask() {
      return Promise.resolve("");
    },
    presentPlan() {},
  };
}

function checkpoint(timestamp: string): Checkpoint {
  return {
    reference: `gitguard-backup-${timestamp}`,
    createdAt: timestamp,
    uncommittedSnapshot: null,
  };
}

function setup(answer = true) {
  const git = new InMemoryGitService();
  const fs = new InMemoryFileSystem();
  const store = new JsonCheckpointStore(fs, LEDGER);
  const logger = new MemoryLogger();
  const interaction = createMockInteraction(answer);
  const useCase = new CleanCheckpointsUseCase({
    git,
    store,
    interaction,
    logger,
  });
  return { git, fs, store, logger, interaction, useCase };
}

test("CleanCheckpointsUseCase - nothing to clean", async () => {
  const { git, logger, interaction, useCase } = setup();
  git.branches.set("main", "c1");

  const output = await useCase.execute();

  expect(output).toEqual({ status: "no_checkpoints", deleted: [], failed: [] });
  expect(interaction.questions).toEqual([]);
  expect(logger.at("success")).toEqual(["No checkpoints found."]);
});

test("CleanCheckpointsUseCase - lists branches and asks once", async () => {
  const { git, logger, interaction, useCase } = setup(false);
  git.branches.set("gitguard-backup-20240101_120000", "c1");
  git.branches.set("gitguard-backup-20240102_090000", "c1");
  git.branches.set("main", "c1");

  const output = await useCase.execute();

  expect(output).toEqual({ status: "cancelled", deleted: [], failed: [] });
  expect(interaction.questions).toEqual([
    "Delete all 2 checkpoint branches?",
  ]);
  expect(logger.at("info")).toEqual([
    "GitGuard checkpoints:",
    "  gitguard-backup-20240101_120000",
    "  gitguard-backup-20240102_090000",
  ]);
  expect(git.branches.size).toBe(3);
});

test("CleanCheckpointsUseCase - deletes branches and their ledger records", async () => {
  const { git, store, useCase } = setup();
  const first = checkpoint("20240101_120000");
  const second = checkpoint("20240102_090000");
  git.branches.set(first.reference, "c1");
  git.branches.set(second.reference, "c1");
  git.branches.set("main", "c1");
  await store.save([second, first]);

  const output = await useCase.execute();

  expect(output).toEqual({
    status: "cleaned",
    deleted: [first.reference, second.reference],
    failed: [],
  });
  expect([...git.branches.keys()]).toEqual(["main"]);
  expect(await store.load()).toEqual([]);
});

test("CleanCheckpointsUseCase - keeps records of branches it could not delete", async () => {
  const { git, store, logger, useCase } = setup();
  const first = checkpoint("20240101_120000");
  git.branches.set(first.reference, "c1");
  await store.save([first]);
  git.failOn("deleteBranch", "branch is checked out");

  const output = await useCase.execute();

  expect(output).toEqual({
    status: "cleaned",
    deleted: [],
    failed: [first.reference],
  });
  expect(await store.load()).toEqual([first]);
  expect(logger.at("error")).toEqual([
    "Failed to delete gitguard-backup-20240101_120000: branch is checked out",
  ]);
});

test("CleanCheckpointsUseCase - leaves an invalid ledger untouched", async () => {
  const { git, fs, logger, useCase } = setup();
  git.branches.set("gitguard-backup-20240101_120000", "c1");
  fs.setFile(LEDGER, "[1, 2, 3]");

  const output = await useCase.execute();

  expect(output.deleted).toEqual(["gitguard-backup-20240101_120000"]);
  expect(fs.getFile(LEDGER)).toBe("[1, 2, 3]");
  expect(logger.at("warn")).toHaveLength(1);
  expect(logger.at("warn")[0]).toMatch(/^Checkpoint ledger left untouched: /);
});

test("CleanCheckpointsUseCase - ignores branches that only share the prefix", async () => {
  const { git, interaction, useCase } = setup();
  git.branches.set("gitguard-backup-20240101_120000-2", "c1");
  git.branches.set("gitguard-backup-notes", "c1");

  const output = await useCase.execute();

  expect(output.deleted).toEqual(["gitguard-backup-20240101_120000-2"]);
  expect(git.branches.has("gitguard-backup-notes")).toBe(true);
  expect(interaction.questions).toEqual([
    "Delete all 1 checkpoint branches?",
  ]);
});

test("isCheckpointReference - matches generated names only", () => {
  expect(isCheckpointReference("gitguard-backup-20240101_120000")).toBe(true);
  expect(isCheckpointReference("gitguard-backup-20240101_120000-3")).toBe(
    true,
  );
  expect(isCheckpointReference("gitguard-backup-notes")).toBe(false);
  expect(isCheckpointReference("main")).toBe(false);
});

test("ListCheckpointsUseCase - returns the ledger most recent first", async () => {
  const { store } = setup();
  const first = checkpoint("20240101_120000");
  const second = checkpoint("20240102_090000");
  await store.prepend(first);
  await store.prepend(second);

  const output = await new ListCheckpointsUseCase(store).execute();

  expect(output).toEqual({ checkpoints: [second, first] });
});
