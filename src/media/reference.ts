import { ParseError } from "../errors.js";

export const MEDIA_KINDS = ["track", "album", "playlist", "artist"] as const;

export type MediaKind = (typeof MEDIA_KINDS)[number];

export interface MediaReference {
  readonly kind: MediaKind;
  readonly id: string;
}

const ID_RE = /^[A-Za-z0-9]{22}$/;
const URI_RE = /^spotify:([a-z]+):([^:?#\s]+)$/;
const LINK_RE = /^(?:https?:\/\/)?open\.spotify\.com\/(?:intl-[A-Za-z-]+\/)?([a-z]+)\/([^/?#\s]+)\/?(?:[?#].*)?$/;

function isMediaKind(value: string): value is MediaKind {
  return MEDIA_KINDS.some((kind) => kind === value);
}

function build(kind: string, id: string): MediaReference | null {
  if (!isMediaKind(kind) || !ID_RE.test(id)) return null;
  return Object.freeze({ kind, id });
}

/**
 * Normalises a Spotify URI (`spotify:album:<id>`), an open.spotify.com share
 * link, or a bare 22-character id (taken as a track).
 */
export function parseMediaReference(raw: string): MediaReference {
  const text = raw.trim();
  const uri = text.match(URI_RE);
  const link = uri ? null : text.match(LINK_RE);
  const match = uri ?? link;
  const ref = match ? build(match[1], match[2]) : ID_RE.test(text) ? build("track", text) : null;
  if (!ref) {
    throw new ParseError(
      "Unsupported media reference. Provide a Spotify URI, share link, or 22-character track ID.",
    );
  }
  return ref;
}

export function tryParseMediaReference(raw: string): MediaReference | undefined {
  try {
    return parseMediaReference(raw);
  } catch {
    return undefined;
  }
}

export function formatMediaUri(ref: MediaReference): string {
  return `spotify:${ref.kind}:${ref.id}`;
}
