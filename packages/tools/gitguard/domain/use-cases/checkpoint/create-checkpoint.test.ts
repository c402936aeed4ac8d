import { expect, test } from "vitest";
import { CreateCheckpointUseCase } from "./create-checkpoint.ts";
import { InMemoryGitService } from "../../../adapters/git/in-memory-git.ts";
import { InMemoryFileSystem } from "../../../adapters/filesystem/in-memory-fs.ts";
import { JsonCheckpointStore } from "../../../adapters/repositories/json-checkpoint-store.ts";
import { MemoryLogger } from "../../../adapters/logging/memory-logger.ts";

const LEDGER = "/repo/.git/gitguard/checkpoints.json";

function setup(timestamps: string[] = ["20240101_120000"]) {
  const git = new InMemoryGitService();
  const fs = new InMemoryFileSystem();
  const store = new JsonCheckpointStore(fs, LEDGER);
  const logger = new MemoryLogger();
  let i = 0;
  const useCase = new CreateCheckpointUseCase(
    git,
    store,
    logger,
    () => timestamps[Math.min(i++, timestamps.length - 1)],
  );
  return { git, fs, store, logger, useCase };
}

test("CreateCheckpointUseCase - skips repositories without commits", async () => {
  const { git, fs, store, logger, useCase } = setup();
  git.head = null;

  const checkpoint = await useCase.execute();

  expect(checkpoint).toBeNull();
  expect(git.branches.size).toBe(0);
  expect(await store.load()).toEqual([]);
  expect(fs.paths()).toEqual([]);
  expect(logger.at("warn")).toEqual(["Skipping checkpoint - no commits yet"]);
});

test("CreateCheckpointUseCase - creates a branch at HEAD and records it", async () => {
  const { git, store, useCase } = setup();
  git.head = "c7";

  const checkpoint = await useCase.execute();

  expect(checkpoint).toEqual({
    reference: "gitguard-backup-20240101_120000",
    createdAt: "20240101_120000",
    uncommittedSnapshot: null,
  });
  expect(git.branches.get("gitguard-backup-20240101_120000")).toBe("c7");
  expect(await store.load()).toEqual([checkpoint]);
});

test("CreateCheckpointUseCase - records a snapshot of uncommitted changes", async () => {
  const { git, store, useCase } = setup();
  git.uncommitted = "edited README.md";

  const checkpoint = await useCase.execute();

  expect(checkpoint?.uncommittedSnapshot).toBe("stash1");
  expect(git.stashes.get("stash1")).toBe("edited README.md");
  expect((await store.load())[0].uncommittedSnapshot).toBe("stash1");
});

test("CreateCheckpointUseCase - same-second checkpoints get a counter suffix", async () => {
  const { store, useCase } = setup(["20240101_120000"]);

  const first = await useCase.execute();
  const second = await useCase.execute();
  const third = await useCase.execute();

  expect(first?.reference).toBe("gitguard-backup-20240101_120000");
  expect(second?.reference).toBe("gitguard-backup-20240101_120000-2");
  expect(third?.reference).toBe("gitguard-backup-20240101_120000-3");
  expect((await store.load()).map((cp) => cp.reference)).toEqual([
    "gitguard-backup-20240101_120000-3",
    "gitguard-backup-20240101_120000-2",
    "gitguard-backup-20240101_120000",
  ]);
});

test("CreateCheckpointUseCase - avoids branches left by another process", async () => {
  const { git, useCase } = setup();
  git.branches.set("gitguard-backup-20240101_120000", "c0");

  const checkpoint = await useCase.execute();

  expect(checkpoint?.reference).toBe("gitguard-backup-20240101_120000-2");
  expect(git.branches.get("gitguard-backup-20240101_120000")).toBe("c0");
});

test("CreateCheckpointUseCase - N creations give a ledger of length N, newest first", async () => {
  const stamps = [
    "20240101_120000",
    "20240101_120001",
    "20240101_120001",
    "20240101_120002",
    "20240101_120002",
  ];
  const { store, useCase } = setup(stamps);

  const created: string[] = [];
  for (let n = 0; n < stamps.length; n++) {
    const checkpoint = await useCase.execute();
    if (checkpoint) created.push(checkpoint.reference);
  }

  const ledger = await store.load();
  expect(ledger).toHaveLength(stamps.length);
  expect(ledger.map((cp) => cp.reference)).toEqual([...created].reverse());
});

test("CreateCheckpointUseCase - snapshot failure still records the checkpoint", async () => {
  const { git, store, logger, useCase } = setup();
  git.uncommitted = "edited README.md";
  git.failOn("createStash", "cannot save the current index state");

  const checkpoint = await useCase.execute();

  expect(checkpoint?.uncommittedSnapshot).toBeNull();
  expect(await store.load()).toHaveLength(1);
  expect(logger.at("warn")).toEqual([
    "Could not snapshot uncommitted changes: cannot save the current index state",
  ]);
});

test("CreateCheckpointUseCase - branch failure is advisory and leaves the ledger alone", async () => {
  const { git, store, logger, useCase } = setup();
  git.failOn("createBranch", "cannot lock ref");

  const checkpoint = await useCase.execute();

  expect(checkpoint).toBeNull();
  expect(await store.load()).toEqual([]);
  expect(logger.at("warn")).toEqual([
    "Could not create checkpoint: cannot lock ref",
  ]);
});

test("CreateCheckpointUseCase - unreadable ledger makes the checkpoint advisory", async () => {
  const { fs, logger, useCase } = setup();
  fs.setFile(LEDGER, "garbage");

  const checkpoint = await useCase.execute();

  expect(checkpoint).toBeNull();
  expect(fs.getFile(LEDGER)).toBe("garbage");
  expect(logger.at("warn")).toHaveLength(1);
  expect(logger.at("warn")[0]).toMatch(/^Could not create checkpoint: /);
});
