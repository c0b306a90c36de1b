import { describe, expect, it } from "vitest";

import { ConfigError, parseConfig } from "../../../src/config.js";
import { createSilentLogger } from "../../../src/log.js";
import { createResilientProvider } from "../../../src/providers/factory.js";
import { FailoverProvider } from "../../../src/providers/failover.js";
import { RotationProvider } from "../../../src/providers/rotation.js";
import { ScriptedProvider, backendError, reply } from "../../../src/testing/harness.js";

const logger = createSilentLogger();

describe("createResilientProvider()", () => {
  it("returns the primary backend in direct mode", () => {
    const openai = new ScriptedProvider("openai");
    const config = parseConfig({ resilience: { primary: "openai" } });

    expect(createResilientProvider({ config, backends: { openai }, logger })).toBe(openai);
  });

  it("wraps the primary with a configured breaker in failover mode", async () => {
    const openai = new ScriptedProvider("openai", [backendError("rate limit exceeded")]);
    const local = new ScriptedProvider("local", [reply("from local")]);
    const config = parseConfig({
      resilience: {
        mode: "failover",
        primary: "openai",
        fallback: "local",
        circuitBreaker: { failureThreshold: 2, timeoutMs: 10_000 },
      },
    });

    const provider = createResilientProvider({ config, backends: { openai, local }, logger });

    if (!(provider instanceof FailoverProvider)) throw new Error("expected a failover provider");
    expect(provider.id).toBe("failover(openai)");
    expect(provider.getPrimary()).toBe(openai);
    expect(provider.getFallback()).toBe(local);
    expect(provider.getCircuitBreaker().getStateInfo()).toMatchObject({ failure_threshold: 2, timeout_ms: 10_000 });

    await expect(provider.chat([], [])).resolves.toMatchObject({ content: "from local" });
  });

  it("builds a rotation over the resolved profiles", async () => {
    const a = new ScriptedProvider("a", [reply("from a")]);
    const b = new ScriptedProvider("b", [reply("from b")]);
    const config = parseConfig({
      resilience: {
        mode: "rotation",
        rotation: {
          strategy: "round_robin",
          profiles: [
            { name: "first", backend: "a", apiKey: "test-key-1" },
            { name: "second", backend: "b", apiKey: "test-key-2", weight: 3 },
          ],
        },
      },
    });

    const provider = createResilientProvider({ config, backends: { a, b }, logger });

    if (!(provider instanceof RotationProvider)) throw new Error("expected a rotation provider");
    expect(provider.listProfiles()).toEqual(["first", "second"]);
    expect(provider.getProfileStatus("second").weight).toBe(3);
    expect((await provider.chat([], [])).content).toBe("from a");
    expect((await provider.chat([], [])).content).toBe("from b");
  });

  it("puts a fallback behind the rotation when one is configured", () => {
    const a = new ScriptedProvider("a");
    const local = new ScriptedProvider("local");
    const config = parseConfig({
      resilience: {
        mode: "rotation",
        fallback: "local",
        rotation: { strategy: "least_used", profiles: [{ name: "first", backend: "a" }] },
      },
    });

    const provider = createResilientProvider({ config, backends: { a, local }, logger });

    if (!(provider instanceof FailoverProvider)) throw new Error("expected a failover provider");
    expect(provider.getPrimary()).toBeInstanceOf(RotationProvider);
    expect(provider.getPrimary().id).toBe("rotation(least_used)");
    expect(provider.getFallback()).toBe(local);
  });

  it("rejects backends the config names but the caller did not supply", () => {
    const config = parseConfig({ resilience: { mode: "failover", primary: "openai", fallback: "missing" } });

    expect(() =>
      createResilientProvider({ config, backends: { openai: new ScriptedProvider("openai") }, logger })
    ).toThrow(new ConfigError("Unknown backend: missing"));
  });
});
