/**
 * Tests for the governance projection: derived records and replay.
 */

import { describe, it, expect } from "vitest";
import { InMemorySnapshotStore } from "@covenant/event-store";
import { governanceProjection, checkpointAt } from "../src/projection.js";
import { isGovernanceState } from "../src/state.js";
import {
  START,
  commitAll,
  createFixture,
  delegationGranted,
  delegationRenewed,
  delegationRevoked,
  lawActivated,
  lawArchived,
  lawCreated,
  lawReviewed,
  workspaceArchived,
  workspaceCreated,
} from "./helpers.js";

describe("governanceProjection", () => {
  it("starts empty", () => {
    expect(governanceProjection.initial()).toEqual({ workspaces: {}, delegations: {}, laws: {} });
  });

  it("records workspaces and their archival", async () => {
    const { store, clock } = createFixture();
    await commitAll(store, [workspaceCreated("ws-1")]);
    clock.advanceDays(1);
    await commitAll(store, [workspaceArchived("ws-1", "merged into ws-2")]);

    expect(store.state.workspaces["ws-1"]).toEqual({
      workspaceId: "ws-1",
      name: "Workspace ws-1",
      parentWorkspaceId: null,
      status: "archived",
      createdAt: START,
      createdBy: "alice",
      archivedAt: "2025-01-02T00:00:00.000Z",
      archiveReason: "merged into ws-2",
    });
  });

  it("derives delegation expiry from commit timestamps", async () => {
    const { store, clock } = createFixture();
    await commitAll(store, [workspaceCreated("ws-1"), delegationGranted("d-1", "alice", "bob", 30)]);

    expect(store.state.delegations["d-1"]?.expiresAt).toBe("2025-01-31T00:00:00.000Z");

    clock.advanceDays(5);
    await commitAll(store, [delegationRenewed("d-1", 60)]);

    expect(store.state.delegations["d-1"]).toEqual({
      delegationId: "d-1",
      workspaceId: "ws-1",
      fromActor: "alice",
      toActor: "bob",
      ttlDays: 60,
      grantedAt: START,
      expiresAt: "2025-03-07T00:00:00.000Z",
      status: "active",
      renewals: 1,
      revokedAt: null,
      revokeReason: null,
    });

    clock.advanceDays(1);
    await commitAll(store, [delegationRevoked("d-1", "role ended")]);
    expect(store.state.delegations["d-1"]?.status).toBe("revoked");
    expect(store.state.delegations["d-1"]?.revokedAt).toBe("2025-01-07T00:00:00.000Z");
    expect(store.state.delegations["d-1"]?.revokeReason).toBe("role ended");
  });

  it("schedules law checkpoints from the activation timestamp", async () => {
    const { store, clock } = createFixture();
    clock.advanceDays(5);
    await commitAll(store, [workspaceCreated("ws-1"), lawCreated("law-1")]);

    expect(store.state.laws["law-1"]?.status).toBe("draft");
    expect(store.state.laws["law-1"]?.nextCheckpointAt).toBeNull();

    await commitAll(store, [lawActivated("law-1")]);
    expect(store.state.laws["law-1"]?.activatedAt).toBe("2025-01-06T00:00:00.000Z");
    expect(store.state.laws["law-1"]?.nextCheckpointAt).toBe("2025-02-05T00:00:00.000Z");

    clock.advanceDays(31);
    await commitAll(store, [lawReviewed("law-1", "continue")]);

    const law = store.state.laws["law-1"];
    expect(law?.status).toBe("active");
    expect(law?.nextCheckpointIndex).toBe(1);
    expect(law?.nextCheckpointAt).toBe("2025-04-06T00:00:00.000Z");
    expect(law?.reviews).toEqual([
      {
        outcome: "continue",
        notes: null,
        completedAt: "2025-02-06T00:00:00.000Z",
        completedBy: "alice",
        position: 3,
      },
    ]);
  });

  it("stops scheduling once the checkpoints run out", () => {
    expect(checkpointAt(START, [30, 90], 1)).toBe("2025-04-01T00:00:00.000Z");
    expect(checkpointAt(START, [30, 90], 2)).toBeNull();
  });

  it("moves a law through adjust, re-activation and archival", async () => {
    const { store, clock } = createFixture();
    await commitAll(store, [
      workspaceCreated("ws-1"),
      lawCreated("law-1"),
      lawActivated("law-1"),
      lawReviewed("law-1", "adjust", "narrow the scope"),
    ]);

    expect(store.state.laws["law-1"]?.status).toBe("adjust");
    expect(store.state.laws["law-1"]?.nextCheckpointAt).toBeNull();

    clock.advanceDays(10);
    await commitAll(store, [lawActivated("law-1")]);
    expect(store.state.laws["law-1"]?.activatedAt).toBe("2025-01-11T00:00:00.000Z");
    expect(store.state.laws["law-1"]?.nextCheckpointAt).toBe("2025-02-10T00:00:00.000Z");

    await commitAll(store, [lawReviewed("law-1", "sunset", "goal met"), lawArchived("law-1", "sunset")]);
    const law = store.state.laws["law-1"];
    expect(law?.status).toBe("archived");
    expect(law?.archiveReason).toBe("sunset");
    expect(law?.reviews.map((r) => r.outcome)).toEqual(["adjust", "sunset"]);
  });

  it("replays to the same state and survives a JSON round trip", async () => {
    const { store, clock } = createFixture();
    await commitAll(store, [
      workspaceCreated("ws-1"),
      delegationGranted("d-1", "alice", "bob"),
      lawCreated("law-1"),
    ]);
    clock.advanceDays(3);
    await commitAll(store, [lawActivated("law-1"), delegationRevoked("d-1", "handover")]);

    const rebuilt = store.rebuild(governanceProjection);
    expect(rebuilt).toEqual(store.state);

    const roundTripped: unknown = JSON.parse(JSON.stringify(store.state));
    expect(roundTripped).toEqual(store.state);
    expect(isGovernanceState(roundTripped)).toBe(true);
  });

  it("answers historical queries", async () => {
    const { store } = createFixture();
    await commitAll(store, [workspaceCreated("ws-1"), workspaceArchived("ws-1", "done")]);

    expect(store.query(governanceProjection, 1).workspaces["ws-1"]?.status).toBe("active");
    expect(store.query(governanceProjection, 0)).toEqual({ workspaces: {}, delegations: {}, laws: {} });
  });

  it("snapshots on interval boundaries and restores from them", async () => {
    const snapshots = new InMemorySnapshotStore();
    const { store } = createFixture({ snapshots, snapshotInterval: 2 });
    await commitAll(store, [
      workspaceCreated("ws-1"),
      workspaceCreated("ws-2"),
      workspaceCreated("ws-3"),
    ]);

    expect(snapshots.loadAtOrBefore("governance", 3)?.position).toBe(2);
    expect(Object.keys(store.query(governanceProjection, 3).workspaces)).toEqual(["ws-1", "ws-2", "ws-3"]);
  });
});

describe("head state", () => {
  it("cannot be changed by callers", async () => {
    const { store } = createFixture();
    await commitAll(store, [workspaceCreated("ws-1")]);
    const workspace = store.state.workspaces["ws-1"];
    if (workspace === undefined) throw new Error("fixture");

    expect(Reflect.set(workspace, "status", "archived")).toBe(false);
    expect(Reflect.set(store.state.workspaces, "ws-9", workspace)).toBe(false);

    const grant = await store.proposeEvent(delegationGranted("d-1", "alice", "bob"));
    expect(grant.status).toBe("committed");
    expect(store.state).toEqual(store.rebuild(governanceProjection));
  });
});

describe("isGovernanceState", () => {
  it("rejects values that are not governance state", () => {
    expect(isGovernanceState({})).toBe(false);
    expect(isGovernanceState({ workspaces: {}, delegations: {}, laws: { x: { lawId: "x" } } })).toBe(false);
    expect(isGovernanceState(null)).toBe(false);
  });
});
