import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { NoProfileAvailableError } from "../../../src/providers/errors.js";
import {
  DEFAULT_ROTATION_COOLDOWN_MS,
  RotationProvider,
  maskApiKey,
} from "../../../src/providers/rotation.js";
import { ScriptedProvider, backendError, reply } from "../../../src/testing/harness.js";
import { createSilentLogger } from "../../../src/log.js";

const logger = createSilentLogger();
const COOLDOWN_MS = 60_000;

function healthy(id: string): ScriptedProvider {
  return new ScriptedProvider(id, [reply(`from ${id}`)], { repeatLast: true });
}

describe("RotationProvider", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fails fast when no profiles are registered", async () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });

    await expect(rotation.chat([], [])).rejects.toBeInstanceOf(NoProfileAvailableError);
    await expect(rotation.chat([], [])).rejects.toThrow("no profile available: no profiles registered");
  });

  it("round robin selects each profile once, in registration order", async () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    rotation.addProfile("profile1", healthy("p1"), "test-key-1");
    rotation.addProfile("profile2", healthy("p2"), "test-key-2");
    rotation.addProfile("profile3", healthy("p3"), "test-key-3");

    const contents: string[] = [];
    for (let i = 0; i < 3; i++) {
      contents.push((await rotation.chat([], [])).content);
    }

    expect(contents).toEqual(["from p1", "from p2", "from p3"]);
    for (const name of ["profile1", "profile2", "profile3"]) {
      expect(rotation.getProfileStatus(name).request_count).toBe(1);
    }

    // wraps back to the start
    expect((await rotation.chat([], [])).content).toBe("from p1");
  });

  it("least used spreads calls evenly and breaks ties by registration order", async () => {
    const rotation = new RotationProvider("least_used", COOLDOWN_MS, { logger });
    rotation.addProfile("profile1", healthy("p1"), "test-key-1");
    rotation.addProfile("profile2", healthy("p2"), "test-key-2");

    const contents: string[] = [];
    for (let i = 0; i < 4; i++) {
      contents.push((await rotation.chat([], [])).content);
    }

    expect(contents).toEqual(["from p1", "from p2", "from p1", "from p2"]);
    const total =
      rotation.getProfileStatus("profile1").request_count + rotation.getProfileStatus("profile2").request_count;
    expect(total).toBe(4);
  });

  it("random picks among available profiles using the injected source", async () => {
    const draws = [0.9, 0.1];
    const rotation = new RotationProvider("random", COOLDOWN_MS, {
      logger,
      random: () => draws.shift() ?? 0,
    });
    rotation.addProfile("profile1", healthy("p1"), "test-key-1");
    rotation.addProfile("profile2", healthy("p2"), "test-key-2");

    expect((await rotation.chat([], [])).content).toBe("from p2");
    expect((await rotation.chat([], [])).content).toBe("from p1");
  });

  it("puts a profile in cooldown after a rate limit error", async () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    const failing = new ScriptedProvider("p1", [backendError("rate limit exceeded")]);
    rotation.addProfile("profile1", failing, "test-key-1");

    await expect(rotation.chat([], [])).rejects.toThrow("rate limit exceeded");

    const status = rotation.getProfileStatus("profile1");
    expect(status.in_cooldown).toBe(true);
    expect(status.cooldown_until).toBe(Date.now() + COOLDOWN_MS);

    rotation.addProfile("profile2", healthy("p2"), "test-key-2");
    expect((await rotation.chat([], [])).content).toBe("from p2");
    expect(failing.callCount).toBe(1);

    rotation.resetCooldown();
    expect(rotation.getProfileStatus("profile1").in_cooldown).toBe(false);
    expect(rotation.getProfileStatus("profile1").cooldown_until).toBeNull();
  });

  it("excludes a profile after an auth error until the cooldown expires", async () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    const flaky = new ScriptedProvider("p1", [backendError("invalid api key"), reply("p1 recovered")]);
    rotation.addProfile("profile1", flaky, "test-key-1");
    rotation.addProfile("profile2", healthy("p2"), "test-key-2");

    await expect(rotation.chat([], [])).rejects.toThrow("invalid api key");

    expect((await rotation.chat([], [])).content).toBe("from p2");
    expect((await rotation.chat([], [])).content).toBe("from p2");

    vi.advanceTimersByTime(COOLDOWN_MS);
    expect((await rotation.chat([], [])).content).toBe("p1 recovered");
  });

  it("does not cool down on timeouts or unknown errors", async () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    rotation.addProfile(
      "profile1",
      new ScriptedProvider("p1", [backendError("timeout"), backendError("something odd happened")]),
      "test-key-1"
    );

    await expect(rotation.chat([], [])).rejects.toThrow("timeout");
    await expect(rotation.chat([], [])).rejects.toThrow("something odd happened");

    expect(rotation.getProfileStatus("profile1")).toMatchObject({ in_cooldown: false, request_count: 2 });
  });

  it("fails fast when every profile is cooling down", async () => {
    const rotation = new RotationProvider("least_used", COOLDOWN_MS, { logger });
    rotation.addProfile("profile1", new ScriptedProvider("p1", [backendError("invalid api key")]), "test-key-1");
    rotation.addProfile("profile2", new ScriptedProvider("p2", [backendError("payment required")]), "test-key-2");

    await expect(rotation.chat([], [])).rejects.toThrow("invalid api key");
    await expect(rotation.chat([], [])).rejects.toThrow("payment required");

    await expect(rotation.chat([], [])).rejects.toThrow("no profile available: all 2 profiles are in cooldown");
  });

  it("removes profiles and keeps the round robin cursor consistent", async () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    rotation.addProfile("profile1", healthy("p1"), "test-key-1");
    rotation.addProfile("profile2", healthy("p2"), "test-key-2");
    rotation.addProfile("profile3", healthy("p3"), "test-key-3");

    expect((await rotation.chat([], [])).content).toBe("from p1");

    expect(rotation.removeProfile("profile1")).toBe(true);
    expect(rotation.removeProfile("missing")).toBe(false);
    expect(rotation.listProfiles()).toEqual(["profile2", "profile3"]);

    expect((await rotation.chat([], [])).content).toBe("from p2");
    expect((await rotation.chat([], [])).content).toBe("from p3");
  });

  it("replaces a profile registered twice under the same name", () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    const replacement = healthy("p1b");
    rotation.addProfile("profile1", healthy("p1"), "test-key-1");
    rotation.addProfile("profile1", replacement, "test-key-2", 3);

    expect(rotation.listProfiles()).toEqual(["profile1"]);
    expect(rotation.getProfile("profile1")?.provider).toBe(replacement);
    expect(rotation.getProfileStatus("profile1").weight).toBe(3);
  });

  it("reports masked keys in profile status", () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    rotation.addProfile("profile1", healthy("p1"), "test-secret-value", 2);

    expect(rotation.getProfileStatus("profile1")).toEqual({
      name: "profile1",
      api_key: "test...alue",
      weight: 2,
      request_count: 0,
      in_cooldown: false,
      cooldown_until: null,
    });
    expect(() => rotation.getProfileStatus("missing")).toThrow("profile not found: missing");
  });

  it("getProfile returns a copy", () => {
    const rotation = new RotationProvider("round_robin", COOLDOWN_MS, { logger });
    rotation.addProfile("profile1", healthy("p1"), "test-key-1");

    const copy = rotation.getProfile("profile1");
    expect(copy?.requestCount).toBe(0);
    expect(rotation.getProfile("missing")).toBeUndefined();
  });

  it("close() closes every profile backend", async () => {
    const rotation = new RotationProvider("round_robin", DEFAULT_ROTATION_COOLDOWN_MS, { logger });
    const p1 = healthy("p1");
    const p2 = healthy("p2");
    rotation.addProfile("profile1", p1, "test-key-1");
    rotation.addProfile("profile2", p2, "test-key-2");

    await rotation.close();

    expect(p1.closed).toBe(true);
    expect(p2.closed).toBe(true);
  });

  it("selects and counts synchronously so concurrent calls never share a profile", async () => {
    const rotation = new RotationProvider("least_used", COOLDOWN_MS, { logger });
    rotation.addProfile("profile1", healthy("p1"), "test-key-1");
    rotation.addProfile("profile2", healthy("p2"), "test-key-2");

    const responses = await Promise.all([rotation.chat([], []), rotation.chat([], [])]);

    expect(responses.map((r) => r.content)).toEqual(["from p1", "from p2"]);
  });
});

describe("maskApiKey()", () => {
  it("masks short and long keys", () => {
    expect(maskApiKey("")).toBe("");
    expect(maskApiKey("short")).toBe("****");
    expect(maskApiKey("12345678")).toBe("****");
    expect(maskApiKey("123456789")).toBe("1234...6789");
  });
});
