import { nanoid } from "nanoid";

export function generateBoardItemId(): string {
  return `item-${nanoid(16)}`;
}

export function tempSuffix(): string {
  return nanoid(10);
}

/**
 * Homarr API keys are `<id>.<secret>`; the id part identifies the key in
 * `apiKeys.getAll` / `apiKeys.delete`.
 */
export function credentialRef(credential: string): string {
  const dot = credential.indexOf(".");
  return dot === -1 ? credential : credential.slice(0, dot);
}

/** Lower-cased, filesystem- and URL-safe form of a container-derived name. */
export function slugifyAppId(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
