import { describe, expect, it } from "vitest";
import { MissingUpstreamArtifact } from "../src/core/errors.js";
import { toRunKey } from "../src/core/ids.js";
import { ChannelStore } from "../src/graph/channels.js";
import { joinByKey } from "../src/graph/join.js";
import type { BoundArtifact } from "../src/graph/types.js";
import { thrown } from "./helpers.js";

const sampleA = toRunKey("sampleA");
const sampleB = toRunKey("sampleB");

function artifact(channel: string, key: string): BoundArtifact {
  return { channel, key: toRunKey(key), path: `/work/${key}_${channel}.vcf`, producer: "Test" };
}

describe("joinByKey", () => {
  it("joins artifacts that all carry the instance key", () => {
    const joined = joinByKey("CombineVariants", sampleA, ["snp", "indel"], [
      artifact("indel", "sampleA"),
      artifact("snp", "sampleA")
    ]);
    expect(joined.snp?.path).toBe("/work/sampleA_snp.vcf");
    expect(joined.indel?.path).toBe("/work/sampleA_indel.vcf");
  });

  it("refuses to pair artifacts from different keys", () => {
    const err = thrown(() =>
      joinByKey("CombineVariants", sampleA, ["snp", "indel"], [artifact("snp", "sampleA"), artifact("indel", "sampleB")])
    );
    expect(err).toBeInstanceOf(MissingUpstreamArtifact);
    expect(err).toMatchObject({ stage: "CombineVariants", key: "sampleA", channel: "indel" });
    expect(err).toHaveProperty("message", "CombineVariants [sampleA]: indel is bound to key sampleB, refusing to join");
  });

  it("reports a channel that never arrived", () => {
    const err = thrown(() => joinByKey("CombineVariants", sampleA, ["snp", "indel"], [artifact("snp", "sampleA")]));
    expect(err).toBeInstanceOf(MissingUpstreamArtifact);
    expect(err).toHaveProperty("message", "CombineVariants [sampleA]: input channel indel was never bound");
  });

  it("rejects the same channel twice", () => {
    const err = thrown(() =>
      joinByKey("CombineVariants", sampleA, ["snp"], [artifact("snp", "sampleA"), artifact("snp", "sampleA")])
    );
    expect(err).toHaveProperty("message", "CombineVariants [sampleA]: snp bound twice");
  });
});

describe("ChannelStore", () => {
  it("resolves waiters registered before the bind", async () => {
    const store = new ChannelStore();
    const pending = store.whenSettled("gvcf", sampleA);
    store.bind(artifact("gvcf", "sampleA"));
    await expect(pending).resolves.toEqual({ ok: true, artifact: artifact("gvcf", "sampleA") });
  });

  it("keeps keys apart", async () => {
    const store = new ChannelStore();
    store.bind(artifact("gvcf", "sampleB"));
    expect(store.peek("gvcf", sampleA)).toBeNull();
    expect(store.peek("gvcf", sampleB)).toEqual({ ok: true, artifact: artifact("gvcf", "sampleB") });
  });

  it("is write-once per channel and key", () => {
    const store = new ChannelStore();
    store.bind(artifact("gvcf", "sampleA"));
    expect(() => store.bind(artifact("gvcf", "sampleA"))).toThrow("channel gvcf already settled for key sampleA");
    expect(() => store.fail("gvcf", sampleA, new Error("late"))).toThrow("already settled");
    store.bind(artifact("gvcf", "sampleB"));
  });

  it("delivers upstream failures to waiters", async () => {
    const store = new ChannelStore();
    const pending = store.whenSettled("snp_vcf", sampleB);
    const error = new Error("SelectVariants failed");
    store.fail("snp_vcf", sampleB, error);
    const value = await pending;
    expect(value.ok).toBe(false);
    if (!value.ok) expect(value.error).toBe(error);
  });
});
