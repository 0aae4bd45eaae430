import { NameMatching } from "@attendance/shared/common/enums";

/**
 * Maps a display name to the key used when comparing names.
 * One normalizer is chosen per process and used at every comparison site.
 */
export type NameNormalizer = (name: string) => string;

export const exactName: NameNormalizer = (name) => name;

export const casefoldName: NameNormalizer = (name) =>
  name.trim().replace(/\s+/g, " ").toLowerCase();

export function getNameNormalizer(mode: NameMatching): NameNormalizer {
  switch (mode) {
    case NameMatching.Casefold:
      return casefoldName;
    case NameMatching.Exact:
      return exactName;
  }
}

export function composeAttendeeName(firstName: string, lastName: string) {
  return `${firstName.trim()} ${lastName.trim()}`.trim();
}
