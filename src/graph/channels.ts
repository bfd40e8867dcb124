import type { RunKey } from "../core/ids.js";
import type { BoundArtifact, ChannelName } from "./types.js";

export type ChannelValue = { ok: true; artifact: BoundArtifact } | { ok: false; error: Error };

interface Slot {
  value: ChannelValue | null;
  promise: Promise<ChannelValue>;
  settle: (value: ChannelValue) => void;
}

function slotId(channel: ChannelName, key: RunKey): string {
  return `${channel}\u0000${key}`;
}

/**
 * Keyed artifact channels. Each (channel, key) slot is settled exactly once: bound to an
 * artifact, or failed with the error that stopped its producer.
 */
export class ChannelStore {
  private readonly slots = new Map<string, Slot>();

  private slot(channel: ChannelName, key: RunKey): Slot {
    const id = slotId(channel, key);
    const existing = this.slots.get(id);
    if (existing) return existing;

    let settle: (value: ChannelValue) => void = () => undefined;
    const promise = new Promise<ChannelValue>((resolve) => {
      settle = resolve;
    });
    const created: Slot = { value: null, promise, settle };
    this.slots.set(id, created);
    return created;
  }

  private settle(channel: ChannelName, key: RunKey, value: ChannelValue): void {
    const s = this.slot(channel, key);
    if (s.value) {
      throw new Error(`channel ${channel} already settled for key ${key}`);
    }
    s.value = value;
    s.settle(value);
  }

  bind(artifact: BoundArtifact): void {
    this.settle(artifact.channel, artifact.key, { ok: true, artifact: { ...artifact } });
  }

  fail(channel: ChannelName, key: RunKey, error: Error): void {
    this.settle(channel, key, { ok: false, error });
  }

  whenSettled(channel: ChannelName, key: RunKey): Promise<ChannelValue> {
    return this.slot(channel, key).promise;
  }

  peek(channel: ChannelName, key: RunKey): ChannelValue | null {
    return this.slots.get(slotId(channel, key))?.value ?? null;
  }
}
