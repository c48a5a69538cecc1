// tests/unit/ssh-key-controller.test.ts - Lambda SSH key lifecycle

import { describe, test, expect, beforeEach } from "vitest";
import {
  ValidationError,
  known,
  absent,
  type SshKeyState,
  type ReadOutcome,
} from "@gpuform/contracts";
import { LambdaClient } from "../../control/src/provider/client";
import { SshKeyController, planSshKey } from "../../control/src/provider/resources/ssh-key";
import { DecodeError } from "../../control/src/provider/errors";
import {
  createMockFetch,
  createMockState,
  GENERATED_PRIVATE_KEY,
  GENERATED_PUBLIC_KEY,
  type MockLambdaState,
} from "../mock-lambda";

let state: MockLambdaState;
let controller: SshKeyController;

const PUBLIC_KEY = "ssh-ed25519 AAAAtest laptop@example";

beforeEach(() => {
  state = createMockState();
  controller = new SshKeyController(
    new LambdaClient({ apiKey: "test-secret", fetchImpl: createMockFetch(state) }),
  );
});

function expectFound(outcome: ReadOutcome<SshKeyState>) {
  if (outcome.kind !== "found") throw new Error(`expected found, got ${outcome.kind}`);
  return outcome;
}

// =============================================================================
// Planning
// =============================================================================

describe("planSshKey", () => {
  test("a supplied public key is known and no private key is expected", () => {
    expect(planSshKey({ name: "laptop", publicKey: PUBLIC_KEY })).toEqual({
      id: { kind: "pending" },
      name: "laptop",
      publicKey: known(PUBLIC_KEY),
      privateKey: absent(),
    });
  });

  test("without a public key both halves are pending", () => {
    const planned = planSshKey({ name: "generated" });
    expect(planned.publicKey.kind).toBe("pending");
    expect(planned.privateKey.kind).toBe("pending");
  });
});

// =============================================================================
// Create
// =============================================================================

describe("SshKeyController.create", () => {
  test("uploads a supplied public key; no private key comes back", async () => {
    const result = await controller.create({ name: "laptop", publicKey: PUBLIC_KEY });

    expect(result.handle).toBe("sshkey-1");
    expect(result.state).toEqual({
      id: known("sshkey-1"),
      name: "laptop",
      publicKey: known(PUBLIC_KEY),
      privateKey: absent(),
    });
    expect(state.calls[0]?.method).toBe("POST");
    expect(state.calls[0]?.path).toBe("ssh-keys");
    expect(state.calls[0]?.body).toEqual({ name: "laptop", public_key: PUBLIC_KEY });
  });

  test("a generated pair returns the private key once", async () => {
    const result = await controller.create({ name: "generated" });

    expect(state.calls[0]?.body).toEqual({ name: "generated" });
    expect(result.state.publicKey).toEqual(known(GENERATED_PUBLIC_KEY));
    expect(result.state.privateKey).toEqual(known(GENERATED_PRIVATE_KEY));
  });

  test("same name twice: generated key has a secret, uploaded key does not", async () => {
    const first = await controller.create({ name: "one" });
    const second = await controller.create({ name: "one", publicKey: PUBLIC_KEY });

    expect(first.state.privateKey).toEqual(known(GENERATED_PRIVATE_KEY));
    expect(second.state.privateKey).toEqual({ kind: "absent" });
    expect(second.handle).toBe("sshkey-2");
  });

  test("an empty private key in the response is absent", async () => {
    state.nextResponse = {
      status: 200,
      text: JSON.stringify({
        data: { id: "sshkey-3", name: "laptop", public_key: PUBLIC_KEY, private_key: "" },
      }),
    };
    const result = await controller.create({ name: "laptop", publicKey: PUBLIC_KEY });
    expect(result.state.privateKey.kind).toBe("absent");
  });

  test("rejects an empty name before any request", async () => {
    await expect(controller.create({ name: "" })).rejects.toBeInstanceOf(ValidationError);
    expect(state.calls).toHaveLength(0);
  });

  test("a response without a data record is DecodeError", async () => {
    state.nextResponse = { status: 200, text: JSON.stringify({ data: [] }) };
    await expect(controller.create({ name: "laptop" })).rejects.toBeInstanceOf(DecodeError);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("SshKeyController.read", () => {
  test("finds the key in the listing; the private key is not listed", async () => {
    const created = await controller.create({ name: "generated" });
    const outcome = expectFound(await controller.read(created.state));

    expect(outcome.state).toEqual({
      id: known("sshkey-1"),
      name: "generated",
      publicKey: known(GENERATED_PUBLIC_KEY),
      privateKey: absent(),
    });
    expect(outcome.drift).toEqual([]);
    expect(state.calls[1]?.method).toBe("GET");
    expect(state.calls[1]?.path).toBe("ssh-keys");
  });

  test("a key missing from the listing is absent", async () => {
    state.sshKeys.push({ id: "sshkey-1", name: "laptop", public_key: PUBLIC_KEY });
    const outcome = await controller.read(controller.importState("sshkey-2"));
    expect(outcome).toEqual({ kind: "absent" });
  });

  test("a 404 on the listing is absent", async () => {
    state.nextResponse = {
      status: 404,
      text: JSON.stringify({ error: { code: "global/object-does-not-exist", message: "Not found" } }),
    };
    const outcome = await controller.read(controller.importState("sshkey-1"));
    expect(outcome).toEqual({ kind: "absent" });
    expect(state.calls).toHaveLength(1);
  });

  test("first listed record wins when ids repeat", async () => {
    state.sshKeys.push(
      { id: "sshkey-7", name: "first", public_key: PUBLIC_KEY },
      { id: "sshkey-7", name: "second", public_key: PUBLIC_KEY },
    );
    const outcome = expectFound(await controller.read(controller.importState("sshkey-7")));
    expect(outcome.state.name).toBe("first");
  });

  test("a renamed remote key is reported as drift", async () => {
    state.sshKeys.push({ id: "sshkey-4", name: "laptop", public_key: PUBLIC_KEY });
    const prior: SshKeyState = {
      id: known(controller.importState("sshkey-4")),
      name: "old-name",
      publicKey: known(PUBLIC_KEY),
      privateKey: absent(),
    };

    const outcome = expectFound(await controller.read(prior));
    expect(outcome.state.name).toBe("laptop");
    expect(outcome.drift).toEqual([{ field: "name", expected: "old-name", actual: "laptop" }]);
  });

  test("a private key present in the listing is known", async () => {
    state.sshKeys.push({
      id: "sshkey-5",
      name: "laptop",
      public_key: PUBLIC_KEY,
      private_key: "test-private-key",
    });
    const outcome = expectFound(await controller.read(controller.importState("sshkey-5")));
    expect(outcome.state.privateKey).toEqual(known("test-private-key"));
  });
});

// =============================================================================
// Update
// =============================================================================

describe("SshKeyController.update", () => {
  const prior: SshKeyState = {
    id: { kind: "pending" },
    name: "laptop",
    publicKey: known(PUBLIC_KEY),
    privateKey: absent(),
  };

  test("applies a new public key without a request", () => {
    const updated = controller.update(prior, { name: "laptop", publicKey: "ssh-ed25519 AAAAnew" });
    expect(updated.publicKey).toEqual(known("ssh-ed25519 AAAAnew"));
    expect(state.calls).toHaveLength(0);
  });

  test("keeps the prior public key when none is given", () => {
    expect(controller.update(prior, { name: "laptop" }).publicKey).toEqual(known(PUBLIC_KEY));
  });

  test("a new name requires replacement", () => {
    expect(() => controller.update(prior, { name: "desktop" })).toThrow(
      "Changing name requires replacing the ssh key",
    );
    expect(controller.identityChanges(prior, { name: "desktop" })).toEqual(["name"]);
  });
});

// =============================================================================
// Delete
// =============================================================================

describe("SshKeyController.delete", () => {
  test("deletes, then reports already gone", async () => {
    const { handle } = await controller.create({ name: "laptop", publicKey: PUBLIC_KEY });

    expect(await controller.delete(handle)).toEqual({ kind: "deleted" });
    expect(await controller.delete(handle)).toEqual({ kind: "already_gone" });
    expect(state.calls[1]?.method).toBe("DELETE");
    expect(state.calls[1]?.path).toBe("ssh-keys/sshkey-1");
  });

  test("a 404 succeeds with a single request", async () => {
    const outcome = await controller.delete(controller.importState("sshkey-999"));

    expect(outcome).toEqual({ kind: "already_gone" });
    expect(state.calls).toHaveLength(1);
    expect(state.calls[0]?.path).toBe("ssh-keys/sshkey-999");
  });
});
