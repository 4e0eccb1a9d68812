import type { RawBookPayload } from "../records/types";

export type FetchLike = typeof fetch;

/** Anything that can turn an ISBN into a raw payload, or `null` for no data. */
export type PayloadSource = {
  readonly name: string;
  fetchPayload: (isbn: string) => Promise<RawBookPayload | null>;
};

export class SourceRequestError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "SourceRequestError";
  }
}
