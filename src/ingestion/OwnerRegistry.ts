/**
 * OwnerRegistry - maps page URLs to the school that owns them.
 */

import { readFileSync } from "fs";

export interface OwnerEntry {
  domain: string;
  ownerId: string;
  name: string;
}

export class OwnerRegistry {
  owners: OwnerEntry[] = [];

  constructor(private ownersPath?: string) {}

  load(): void {
    if (!this.ownersPath) return;
    const raw = readFileSync(this.ownersPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    this.owners = parseOwners(parsed);
    console.log(`[OwnerRegistry] Loaded ${this.owners.length} owners`);
  }

  /**
   * Resolve the owner of a URL by domain, then by a hint such as the
   * source file name ("cmu_pages.json" → "cmu").
   */
  identify(url: string, hint?: string): OwnerEntry | null {
    const hostname = hostnameOf(url);
    if (hostname) {
      const byDomain = this.owners.find(
        (owner) =>
          hostname === owner.domain || hostname.endsWith(`.${owner.domain}`),
      );
      if (byDomain) return byDomain;
    }

    if (hint) {
      const needle = hint.toLowerCase();
      const byHint = this.owners.find(
        (owner) =>
          owner.ownerId === needle || owner.name.toLowerCase().includes(needle),
      );
      if (byHint) return byHint;
    }

    return null;
  }
}

function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function parseOwners(parsed: unknown): OwnerEntry[] {
  if (typeof parsed !== "object" || parsed === null || !("owners" in parsed)) {
    return [];
  }
  const list = parsed.owners;
  if (!Array.isArray(list)) return [];

  const owners: OwnerEntry[] = [];
  for (const item of list) {
    if (
      typeof item === "object" &&
      item !== null &&
      "domain" in item &&
      "ownerId" in item &&
      "name" in item &&
      typeof item.domain === "string" &&
      typeof item.ownerId === "string" &&
      typeof item.name === "string"
    ) {
      owners.push({ domain: item.domain, ownerId: item.ownerId, name: item.name });
    } else {
      console.warn("[OwnerRegistry] Skipping invalid owner entry:", item);
    }
  }
  return owners;
}
