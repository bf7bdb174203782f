import { z } from "zod"
import { type Manifest, manifestSchema } from "../ports/manifest"
import { ManifestError } from "./manifest-error"

/**
 * Decodes a manifest from its structured form. Missing lists become `[]`;
 * nothing beyond the shape is checked.
 *
 * @throws ManifestError `invalid_manifest` on a shape mismatch.
 */
export function decodeManifest(value: unknown): Manifest {
  const result = manifestSchema.safeParse(value)

  if (!result.success) {
    throw ManifestError.invalid(z.prettifyError(result.error))
  }

  return result.data
}

/**
 * @throws ManifestError `invalid_manifest_json` when `text` is not JSON, or
 * `invalid_manifest` when it does not decode.
 */
export function parseManifestJSON(text: string): Manifest {
  let value: unknown

  try {
    value = JSON.parse(text)
  } catch (err) {
    throw ManifestError.invalidJson(err)
  }

  return decodeManifest(value)
}
