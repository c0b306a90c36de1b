/**
 * Rotation Provider - spreads requests over named backend profiles
 * (typically one per API key or account) and benches a profile for a while
 * after an endpoint-level failure.
 */

import type { Logger } from "../log.js";
import {
  DefaultErrorClassifier,
  NoProfileAvailableError,
  getErrorMessage,
  isFailoverEligible,
  type ErrorClassifier,
  type FailoverReason,
} from "./errors.js";
import type { ChatOptions, ChatResponse, Provider, ProviderMessage, ToolDefinition } from "./types.js";

export type RotationStrategy = "round_robin" | "least_used" | "random";

export const ROTATION_STRATEGIES: readonly RotationStrategy[] = ["round_robin", "least_used", "random"];

export interface RotationProfile {
  name: string;
  provider: Provider;
  apiKey: string;
  weight: number;
  requestCount: number;
  /** Epoch ms; 0 when not cooling down. */
  cooldownUntil: number;
}

export interface RotationProfileStatus {
  name: string;
  api_key: string;
  weight: number;
  request_count: number;
  in_cooldown: boolean;
  cooldown_until: number | null;
}

export interface RotationProviderOptions {
  classifier?: ErrorClassifier;
  logger?: Logger;
  id?: string;
  /** Uniform source in [0, 1) for the random strategy. */
  random?: () => number;
}

export const DEFAULT_ROTATION_COOLDOWN_MS = 60 * 1000;

export function maskApiKey(apiKey: string): string {
  const trimmed = apiKey.trim();
  if (!trimmed) return "";
  if (trimmed.length <= 8) return "****";
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

export class RotationProvider implements Provider {
  readonly id: string;
  private readonly profiles: RotationProfile[] = [];
  private readonly strategy: RotationStrategy;
  private readonly cooldownMs: number;
  private readonly classifier: ErrorClassifier;
  private readonly logger?: Logger;
  private readonly random: () => number;
  private cursor = 0;

  constructor(strategy: RotationStrategy, cooldownMs: number, options: RotationProviderOptions = {}) {
    this.strategy = strategy;
    this.cooldownMs = Math.max(0, cooldownMs);
    this.classifier = options.classifier ?? new DefaultErrorClassifier();
    this.logger = options.logger;
    this.id = options.id ?? `rotation(${strategy})`;
    this.random = options.random ?? Math.random;
  }

  getStrategy(): RotationStrategy {
    return this.strategy;
  }

  addProfile(name: string, provider: Provider, apiKey: string, weight = 1): void {
    const profile: RotationProfile = {
      name,
      provider,
      apiKey,
      weight,
      requestCount: 0,
      cooldownUntil: 0,
    };
    const index = this.profiles.findIndex((p) => p.name === name);
    if (index >= 0) {
      this.profiles[index] = profile;
      this.logger?.warn({ profile: name }, "Rotation profile already registered, replacing");
      return;
    }
    this.profiles.push(profile);
    this.logger?.info({ profile: name, provider: provider.id, weight }, "Rotation profile added");
  }

  removeProfile(name: string): boolean {
    const index = this.profiles.findIndex((p) => p.name === name);
    if (index < 0) return false;
    this.profiles.splice(index, 1);
    if (index < this.cursor) {
      this.cursor -= 1;
    }
    if (this.cursor >= this.profiles.length) {
      this.cursor = 0;
    }
    this.logger?.info({ profile: name }, "Rotation profile removed");
    return true;
  }

  listProfiles(): string[] {
    return this.profiles.map((p) => p.name);
  }

  getProfile(name: string): Readonly<RotationProfile> | undefined {
    const profile = this.profiles.find((p) => p.name === name);
    return profile ? { ...profile } : undefined;
  }

  getProfileStatus(name: string): RotationProfileStatus {
    const profile = this.profiles.find((p) => p.name === name);
    if (!profile) {
      throw new Error(`profile not found: ${name}`);
    }
    const inCooldown = this.isCoolingDown(profile, Date.now());
    return {
      name: profile.name,
      api_key: maskApiKey(profile.apiKey),
      weight: profile.weight,
      request_count: profile.requestCount,
      in_cooldown: inCooldown,
      cooldown_until: inCooldown ? profile.cooldownUntil : null,
    };
  }

  resetCooldown(): void {
    for (const profile of this.profiles) {
      profile.cooldownUntil = 0;
    }
    this.logger?.info({ count: this.profiles.length }, "Rotation cooldowns reset");
  }

  shouldSetCooldown(reason: FailoverReason): boolean {
    return isFailoverEligible(reason);
  }

  async chat(messages: ProviderMessage[], tools: ToolDefinition[], options?: ChatOptions): Promise<ChatResponse> {
    // Selection and the count bump happen before the first await.
    const profile = this.selectProfile(Date.now());
    if (!profile) {
      throw new NoProfileAvailableError(this.profiles.length);
    }
    profile.requestCount += 1;

    this.logger?.debug(
      { profile: profile.name, strategy: this.strategy, requestCount: profile.requestCount },
      "Rotation profile selected"
    );

    try {
      return await profile.provider.chat(messages, tools, options);
    } catch (err) {
      const reason = this.classifier.classify(err);
      if (this.shouldSetCooldown(reason)) {
        profile.cooldownUntil = Date.now() + this.cooldownMs;
        this.logger?.warn(
          { profile: profile.name, reason, cooldownMs: this.cooldownMs, error: getErrorMessage(err) },
          "Rotation profile cooling down"
        );
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    for (const profile of this.profiles) {
      await profile.provider.close?.();
    }
  }

  private isCoolingDown(profile: RotationProfile, now: number): boolean {
    return profile.cooldownUntil > now;
  }

  private selectProfile(now: number): RotationProfile | undefined {
    if (this.profiles.length === 0) return undefined;
    switch (this.strategy) {
      case "round_robin":
        return this.selectRoundRobin(now);
      case "least_used":
        return this.selectLeastUsed(now);
      case "random":
        return this.selectRandom(now);
    }
  }

  private selectRoundRobin(now: number): RotationProfile | undefined {
    const count = this.profiles.length;
    for (let offset = 0; offset < count; offset++) {
      const index = (this.cursor + offset) % count;
      const candidate = this.profiles[index];
      if (candidate && !this.isCoolingDown(candidate, now)) {
        this.cursor = (index + 1) % count;
        return candidate;
      }
    }
    return undefined;
  }

  private selectLeastUsed(now: number): RotationProfile | undefined {
    let best: RotationProfile | undefined;
    for (const candidate of this.profiles) {
      if (this.isCoolingDown(candidate, now)) continue;
      if (!best || candidate.requestCount < best.requestCount) {
        best = candidate;
      }
    }
    return best;
  }

  private selectRandom(now: number): RotationProfile | undefined {
    const available = this.profiles.filter((p) => !this.isCoolingDown(p, now));
    if (available.length === 0) return undefined;
    const index = Math.min(available.length - 1, Math.floor(this.random() * available.length));
    return available[index];
  }
}
