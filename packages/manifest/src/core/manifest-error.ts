import { BaseError } from "@plugkit/errors"

export type ManifestErrorCode = "invalid_manifest" | "invalid_manifest_json"

export class ManifestError extends BaseError<ManifestErrorCode> {
  static invalid(details: string): ManifestError {
    return new ManifestError(`manifest is invalid:\n${details}`, {
      code: "invalid_manifest",
      context: { details },
    })
  }

  static invalidJson(cause: unknown): ManifestError {
    return new ManifestError("manifest is not valid JSON", {
      code: "invalid_manifest_json",
      cause,
    })
  }
}
