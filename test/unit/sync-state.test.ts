/**
 * Unit tests for sync state management.
 *
 * Tests the sync state file operations including:
 * - Creating empty state
 * - Loading state from file (exists, missing, empty, corrupted)
 * - Saving state atomically
 * - Recording, looking up and forgetting paths
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  createEmptyState,
  loadState,
  saveState,
  recordSynced,
  getRecord,
  forgetPath,
  isSynchronized,
  pendingPaths,
  STATE_FILE_VERSION,
  DEFAULT_STATE_FILE_NAME,
} from "../../src/sync/state.js";
import type { SyncStateFile } from "../../src/types.js";
import { createTempDir, removeTempDir } from "../helpers.js";

describe("sync state management", () => {
  let tempDir: string;
  let stateFilePath: string;

  beforeEach(async () => {
    tempDir = await createTempDir("sync-state-test-");
    stateFilePath = path.join(tempDir, DEFAULT_STATE_FILE_NAME);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(tempDir);
  });

  describe("createEmptyState", () => {
    it("returns a state object with correct version and empty maps", () => {
      const state = createEmptyState();

      expect(state).toEqual({
        version: STATE_FILE_VERSION,
        lastSyncTime: "",
        localFiles: {},
        remoteFiles: {},
      });
    });

    it("returns a new object each time (not shared reference)", () => {
      const state1 = createEmptyState();
      const state2 = createEmptyState();

      expect(state1).not.toBe(state2);
      expect(state1.localFiles).not.toBe(state2.localFiles);
      expect(state1.remoteFiles).not.toBe(state2.remoteFiles);
    });
  });

  describe("loadState", () => {
    it("returns empty state when file does not exist", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      const state = await loadState(stateFilePath);

      expect(state).toEqual(createEmptyState());
      expect(warn).not.toHaveBeenCalled();
    });

    it("returns empty state for an empty file", async () => {
      await fs.writeFile(stateFilePath, "   \n", "utf-8");

      const state = await loadState(stateFilePath);

      expect(state).toEqual(createEmptyState());
    });

    it("loads valid state file correctly", async () => {
      const validState: SyncStateFile = {
        version: 1,
        lastSyncTime: "2026-02-06T12:00:00.000Z",
        localFiles: { "docs/readme.txt": { revision: "r1", modifiedAt: 1700000000000 } },
        remoteFiles: { "docs/readme.txt": { revision: "r1", modifiedAt: 1700000000000 } },
      };
      await fs.writeFile(stateFilePath, JSON.stringify(validState), "utf-8");

      const state = await loadState(stateFilePath);

      expect(state).toEqual(validState);
    });

    it("warns and returns empty state for corrupted JSON", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      await fs.writeFile(stateFilePath, "{ not json", "utf-8");

      const state = await loadState(stateFilePath);

      expect(state).toEqual(createEmptyState());
      expect(warn).toHaveBeenCalledWith(
        `[sync-state] Failed to parse state file ${stateFilePath}:`,
        expect.any(String)
      );
    });

    it("warns and returns empty state when a record is malformed", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      await fs.writeFile(
        stateFilePath,
        JSON.stringify({
          version: 1,
          lastSyncTime: "",
          localFiles: { "a.txt": { revision: 3, modifiedAt: 1 } },
          remoteFiles: {},
        }),
        "utf-8"
      );

      const state = await loadState(stateFilePath);

      expect(state).toEqual(createEmptyState());
      expect(warn).toHaveBeenCalledWith(
        `[sync-state] State file ${stateFilePath} has invalid structure. Starting fresh.`
      );
    });

    it("rejects a state file without the remote map", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined);
      await fs.writeFile(
        stateFilePath,
        JSON.stringify({ version: 1, localFiles: {} }),
        "utf-8"
      );

      const state = await loadState(stateFilePath);

      expect(state).toEqual(createEmptyState());
    });

    it("defaults a missing lastSyncTime to an empty string", async () => {
      await fs.writeFile(
        stateFilePath,
        JSON.stringify({ version: 1, localFiles: {}, remoteFiles: {} }),
        "utf-8"
      );

      const state = await loadState(stateFilePath);

      expect(state.lastSyncTime).toBe("");
    });
  });

  describe("saveState", () => {
    it("writes state that loadState reads back", async () => {
      const state = createEmptyState();
      recordSynced(state, "notes.txt", { revision: "r7", modifiedAt: 1234.5 });
      state.lastSyncTime = "2026-03-01T08:00:00.000Z";

      await saveState(stateFilePath, state);

      expect(await loadState(stateFilePath)).toEqual(state);
    });

    it("creates missing parent directories", async () => {
      const nested = path.join(tempDir, "a", "b", "state.json");

      await saveState(nested, createEmptyState());

      const content = await fs.readFile(nested, "utf-8");
      expect(JSON.parse(content)).toEqual(createEmptyState());
    });

    it("leaves no temporary file behind", async () => {
      await saveState(stateFilePath, createEmptyState());

      const entries = await fs.readdir(tempDir);
      expect(entries).toEqual([DEFAULT_STATE_FILE_NAME]);
    });

    it("writes pretty-printed JSON", async () => {
      await saveState(stateFilePath, createEmptyState());

      const content = await fs.readFile(stateFilePath, "utf-8");
      expect(content).toBe(JSON.stringify(createEmptyState(), null, 2));
    });
  });

  describe("recordSynced", () => {
    it("writes the same record to both maps", () => {
      const state = createEmptyState();

      recordSynced(state, "docs/readme.txt", { revision: "r1", modifiedAt: 100 });

      expect(state.localFiles["docs/readme.txt"]).toEqual({ revision: "r1", modifiedAt: 100 });
      expect(state.remoteFiles["docs/readme.txt"]).toEqual({ revision: "r1", modifiedAt: 100 });
    });

    it("does not share record objects between the maps", () => {
      const state = createEmptyState();
      const record = { revision: "r1", modifiedAt: 100 };

      recordSynced(state, "a.txt", record);
      record.modifiedAt = 200;

      expect(state.localFiles["a.txt"]?.modifiedAt).toBe(100);
      expect(state.localFiles["a.txt"]).not.toBe(state.remoteFiles["a.txt"]);
    });
  });

  describe("filenames that shadow object keys", () => {
    it("stores a __proto__ path as an ordinary record", () => {
      const state = createEmptyState();

      recordSynced(state, "__proto__", { revision: "r1", modifiedAt: 10 });

      expect(Object.keys(state.localFiles)).toEqual(["__proto__"]);
      expect(getRecord(state.localFiles, "__proto__")).toEqual({ revision: "r1", modifiedAt: 10 });
      expect(getRecord(state.remoteFiles, "__proto__")).toEqual({ revision: "r1", modifiedAt: 10 });
    });

    it("saves and reloads a __proto__ path", async () => {
      const state = createEmptyState();
      recordSynced(state, "__proto__", { revision: "r1", modifiedAt: 10 });

      await saveState(stateFilePath, state);
      const loaded = await loadState(stateFilePath);

      expect(getRecord(loaded.localFiles, "__proto__")).toEqual({ revision: "r1", modifiedAt: 10 });
      expect(getRecord(loaded.remoteFiles, "__proto__")).toEqual({ revision: "r1", modifiedAt: 10 });
      expect(isSynchronized(loaded, "__proto__")).toBe(true);
    });
  });

  describe("getRecord", () => {
    it("ignores inherited object keys", () => {
      const state = createEmptyState();

      expect(getRecord(state.localFiles, "constructor")).toBeUndefined();
      expect(getRecord(state.localFiles, "toString")).toBeUndefined();
    });

    it("returns the stored record", () => {
      const state = createEmptyState();
      recordSynced(state, "a.txt", { revision: "r2", modifiedAt: 5 });

      expect(getRecord(state.remoteFiles, "a.txt")).toEqual({ revision: "r2", modifiedAt: 5 });
    });
  });

  describe("forgetPath", () => {
    it("removes the path from both maps", () => {
      const state = createEmptyState();
      recordSynced(state, "a.txt", { revision: "r1", modifiedAt: 1 });
      recordSynced(state, "b.txt", { revision: "r2", modifiedAt: 2 });

      forgetPath(state, "a.txt");

      expect(Object.keys(state.localFiles)).toEqual(["b.txt"]);
      expect(Object.keys(state.remoteFiles)).toEqual(["b.txt"]);
    });

    it("is a no-op for unknown paths", () => {
      const state = createEmptyState();

      forgetPath(state, "missing.txt");

      expect(state).toEqual(createEmptyState());
    });
  });

  describe("isSynchronized / pendingPaths", () => {
    it("treats equal records in both maps as synchronized", () => {
      const state = createEmptyState();
      recordSynced(state, "a.txt", { revision: "r1", modifiedAt: 1 });

      expect(isSynchronized(state, "a.txt")).toBe(true);
      expect(pendingPaths(state)).toEqual([]);
    });

    it("lists paths missing from one map or differing, sorted", () => {
      const state = createEmptyState();
      recordSynced(state, "ok.txt", { revision: "r1", modifiedAt: 1 });
      state.localFiles["z-local-only.txt"] = { revision: "r2", modifiedAt: 2 };
      state.remoteFiles["b-remote-only.txt"] = { revision: "r3", modifiedAt: 3 };
      state.localFiles["m-differs.txt"] = { revision: "r4", modifiedAt: 4 };
      state.remoteFiles["m-differs.txt"] = { revision: "r5", modifiedAt: 4 };

      expect(pendingPaths(state)).toEqual(["b-remote-only.txt", "m-differs.txt", "z-local-only.txt"]);
      expect(isSynchronized(state, "m-differs.txt")).toBe(false);
    });
  });
});
