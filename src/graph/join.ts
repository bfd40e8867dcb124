import { MissingUpstreamArtifact } from "../core/errors.js";
import type { RunKey } from "../core/ids.js";
import type { BoundArtifact, ChannelName } from "./types.js";

/**
 * Pairs the artifacts feeding one stage instance. Every artifact must carry the instance's
 * key and every declared channel must be present exactly once; nothing is matched by position.
 */
export function joinByKey(
  stage: string,
  key: RunKey,
  channels: readonly ChannelName[],
  artifacts: readonly BoundArtifact[]
): Record<ChannelName, BoundArtifact> {
  const joined: Record<ChannelName, BoundArtifact> = {};

  for (const artifact of artifacts) {
    if (artifact.key !== key) {
      throw new MissingUpstreamArtifact(
        stage,
        key,
        artifact.channel,
        `${stage} [${key}]: ${artifact.channel} is bound to key ${artifact.key}, refusing to join`
      );
    }
    if (!channels.includes(artifact.channel)) {
      throw new MissingUpstreamArtifact(stage, key, artifact.channel, `${stage} [${key}]: unexpected input channel ${artifact.channel}`);
    }
    if (joined[artifact.channel]) {
      throw new MissingUpstreamArtifact(stage, key, artifact.channel, `${stage} [${key}]: ${artifact.channel} bound twice`);
    }
    joined[artifact.channel] = artifact;
  }

  for (const channel of channels) {
    if (!joined[channel]) throw new MissingUpstreamArtifact(stage, key, channel);
  }
  return joined;
}
