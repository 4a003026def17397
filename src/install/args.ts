import { parseArgs as nodeParseArgs } from "node:util";
import { groupIds } from "../catalog";
import { InstallError } from "../core/errors";
import type { MutationGroup } from "../core/types";
import type { InstallOptions } from "./types";

function parseGroups(raw: string, valid: string[]): string[] {
  const values = raw
    .split(",")
    .map((x) => x.trim().toLowerCase())
    .filter(Boolean);
  const invalid = values.filter((value) => !valid.includes(value));
  if (invalid.length > 0) {
    throw new InstallError(
      `Invalid groups: ${invalid.join(", ")}. Valid values: ${valid.join(", ")}`,
    );
  }
  if (values.length === 0) {
    throw new InstallError("--groups needs at least one group");
  }
  return [...new Set(values)];
}

export function parseArgs(
  argv: string[],
  catalog?: MutationGroup[],
): InstallOptions {
  let values: {
    groups?: string;
    all?: boolean;
    "dry-run"?: boolean;
  };

  try {
    ({ values } = nodeParseArgs({
      args: argv,
      options: {
        groups: { type: "string" },
        all: { type: "boolean" },
        "dry-run": { type: "boolean" },
      },
      strict: true,
    }));
  } catch (err) {
    if (err instanceof TypeError) {
      throw new InstallError(err.message);
    }
    throw err;
  }

  const valid = groupIds(catalog);
  if (values.all && values.groups !== undefined) {
    throw new InstallError("Use either --groups or --all, not both");
  }

  let groups: string[];
  if (values.all) {
    groups = valid;
  } else if (values.groups !== undefined) {
    groups = parseGroups(values.groups, valid);
  } else {
    throw new InstallError(
      `Nothing selected. Pass --groups <list> or --all (groups: ${valid.join(", ")})`,
    );
  }

  return { groups, dryRun: values["dry-run"] ?? false };
}
