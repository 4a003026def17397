import { InstallError } from "../core/errors";
import type { MutationGroup } from "../core/types";
import { NYARCH_CATALOG } from "./nyarch";

export { NYARCH_CATALOG } from "./nyarch";

export function groupIds(catalog: MutationGroup[] = NYARCH_CATALOG): string[] {
  return catalog.map((g) => g.id);
}

export function getGroup(
  id: string,
  catalog: MutationGroup[] = NYARCH_CATALOG,
): MutationGroup | undefined {
  return catalog.find((g) => g.id === id);
}

/**
 * Selected groups in catalog order. Throws on ids the catalog does not
 * know, or on a catalog that repeats a group or mutation id.
 */
export function selectGroups(
  selected: Iterable<string>,
  catalog: MutationGroup[] = NYARCH_CATALOG,
): MutationGroup[] {
  validateCatalog(catalog);
  const wanted = new Set(selected);
  const known = new Set(groupIds(catalog));
  const unknown = [...wanted].filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new InstallError(
      `Unknown groups: ${unknown.join(", ")}. Valid values: ${[...known].join(", ")}`,
    );
  }
  return catalog.filter((g) => wanted.has(g.id));
}

export function validateCatalog(catalog: MutationGroup[]): void {
  const groups = new Set<string>();
  for (const group of catalog) {
    if (groups.has(group.id)) {
      throw new InstallError(`Duplicate group id "${group.id}" in catalog`);
    }
    groups.add(group.id);

    const ids = new Set<string>();
    for (const mutation of group.mutations) {
      if (ids.has(mutation.id)) {
        throw new InstallError(
          `Duplicate mutation id "${mutation.id}" in group "${group.id}"`,
        );
      }
      ids.add(mutation.id);
    }
  }
}
