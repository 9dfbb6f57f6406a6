import { BaseError } from "@wid/errors"

export type SpiffeIdErrorReason =
  | "empty"
  | "wrong_scheme"
  | "missing_trust_domain"
  | "bad_trust_domain_char"
  | "trust_domain_too_long"
  | "empty_segment"
  | "dot_segment"
  | "bad_path_segment_char"

const MESSAGES: Record<SpiffeIdErrorReason, string> = {
  empty: "SPIFFE ID or trust domain is empty",
  wrong_scheme: 'scheme is missing or not "spiffe"',
  missing_trust_domain: "trust domain is missing",
  bad_trust_domain_char:
    "trust domain characters are limited to lowercase letters, numbers, dots, dashes, and underscores",
  trust_domain_too_long: "trust domain is longer than 255 characters",
  empty_segment: "path cannot contain empty segments",
  dot_segment: "path cannot contain dot segments",
  bad_path_segment_char:
    "path segment characters are limited to letters, numbers, dots, dashes, and underscores",
}

export class SpiffeIdError extends BaseError<"invalid_spiffe_id"> {
  readonly reason: SpiffeIdErrorReason

  constructor(reason: SpiffeIdErrorReason, input: string) {
    super(MESSAGES[reason], { code: "invalid_spiffe_id", context: { reason, input } })
    this.reason = reason
  }
}
