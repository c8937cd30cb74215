// src/fetcher/types.ts
import type { Dispatcher } from "undici";

/**
 * Link-preview metadata for one page.
 * Populated from Open Graph tags first, then standard HTML tags.
 * A field is `null` when no tag for it was found.
 */
export type Metadata = Readonly<{
  title: string | null;
  description: string | null;
  image: string | null;
}>;

export function createMetadata(fields: Partial<Metadata> = {}): Metadata {
  return {
    title: fields.title ?? null,
    description: fields.description ?? null,
    image: fields.image ?? null,
  };
}

/** Options shared by every operation that goes to the network. */
export interface FetchOptions {
  /** Aborting rejects the pending operation with a CancelledError. */
  signal?: AbortSignal;
  /** undici transport; defaults to the global dispatcher. */
  dispatcher?: Dispatcher;
}

/** Outcome of a single successful GET. */
export type FetchResult = {
  status: number;
  url: string; // final URL after redirects
  contentType: string;
  body: string;
};
