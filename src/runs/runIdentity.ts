import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";

export function deriveCanonicalParamsHash(canonicalParams: unknown): `sha256:${string}` {
  return sha256Prefixed(stableJsonStringify(canonicalParams));
}
