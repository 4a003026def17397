import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { rmSync } from "node:fs";
import { join } from "node:path";
import type { InstallerConfig } from "../../core/schemas";
import type { MutationGroup } from "../../core/types";
import { fakeRunner, makeTempDir } from "../../core/__tests__/helpers";
import { interactiveInstall } from "../interactive";

interface PromptState {
  selectReturn: unknown;
  confirmReturn: unknown;
  warnings: string[];
  errors: string[];
  successes: string[];
}

const prompts = vi.hoisted(
  (): PromptState => ({
    selectReturn: [],
    confirmReturn: true,
    warnings: [],
    errors: [],
    successes: [],
  }),
);

vi.mock("@clack/prompts", () => ({
  intro: () => {},
  outro: () => {},
  cancel: () => {},
  log: {
    info: () => {},
    message: () => {},
    success: (msg: string) => prompts.successes.push(msg),
    warn: (msg: string) => prompts.warnings.push(msg),
    error: (msg: string) => prompts.errors.push(msg),
  },
  isCancel: (val: unknown) => typeof val === "symbol",
  multiselect: async () => prompts.selectReturn,
  confirm: async () => prompts.confirmReturn,
}));

const CATALOG: MutationGroup[] = [
  {
    id: "desktop",
    label: "Desktop bits",
    scope: "user",
    needsAssets: false,
    mutations: [
      { kind: "run_installer", id: "hello", description: "hello", command: "hello", args: [] },
    ],
  },
  {
    id: "packages",
    label: "System packages",
    scope: "system",
    needsAssets: false,
    mutations: [
      {
        kind: "run_installer",
        id: "apt",
        description: "apt",
        command: "apt-get",
        args: ["install", "-y", "kitty"],
        sudo: true,
      },
    ],
  },
];

let root: string;
let config: InstallerConfig;

beforeEach(() => {
  root = makeTempDir("interactive");
  config = {
    owner: "NyarchLinux",
    repo: "NyarchLinux",
    archiveName: "NyarchLinux.tar.gz",
    apiBaseUrl: "https://api.test",
    cacheRoot: join(root, "cache"),
    layoutCandidates: ["NyarchLinuxComp/Gnome"],
  };
  prompts.selectReturn = [];
  prompts.confirmReturn = true;
  prompts.warnings = [];
  prompts.errors = [];
  prompts.successes = [];
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("interactiveInstall", () => {
  test("applies the selected groups", async () => {
    prompts.selectReturn = ["desktop"];
    const { runner, lines } = fakeRunner();

    const code = await interactiveInstall({ catalog: CATALOG, runner, home: root, config });

    expect(code).toBe(0);
    expect(lines()).toEqual(["hello"]);
    expect(prompts.successes).toEqual(["SUCCESS: desktop/hello (ran hello)"]);
    expect(prompts.warnings).toEqual([]);
  });

  test("the closing summary does not repeat each result", async () => {
    prompts.selectReturn = ["desktop"];
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await interactiveInstall({ catalog: CATALOG, runner: fakeRunner().runner, home: root, config });

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines).not.toContain("SUCCESS: desktop/hello (ran hello)");
    expect(lines).toContain("  desktop: 1/1 succeeded");
  });

  test("warns before running system groups", async () => {
    prompts.selectReturn = ["packages"];
    const { runner } = fakeRunner();

    await interactiveInstall({ catalog: CATALOG, runner, home: root, config });

    expect(prompts.warnings).toEqual(["packages will run commands with sudo."]);
  });

  test("cancelling the menu changes nothing", async () => {
    prompts.selectReturn = Symbol("cancel");
    const { runner, calls } = fakeRunner();

    expect(await interactiveInstall({ catalog: CATALOG, runner, home: root, config })).toBe(0);
    expect(calls).toEqual([]);
  });

  test("declining the confirmation changes nothing", async () => {
    prompts.selectReturn = ["desktop"];
    prompts.confirmReturn = false;
    const { runner, calls } = fakeRunner();

    expect(await interactiveInstall({ catalog: CATALOG, runner, home: root, config })).toBe(0);
    expect(calls).toEqual([]);
  });

  test("an empty selection is not an error", async () => {
    prompts.selectReturn = [];
    const { runner, calls } = fakeRunner();

    expect(await interactiveInstall({ catalog: CATALOG, runner, home: root, config })).toBe(0);
    expect(calls).toEqual([]);
  });

  test("a failed mutation yields exit code 1", async () => {
    prompts.selectReturn = ["packages"];
    const { runner } = fakeRunner({ sudo: 100 });

    const code = await interactiveInstall({ catalog: CATALOG, runner, home: root, config });

    expect(code).toBe(1);
    expect(prompts.errors).toEqual([
      "FAILED: packages/apt (sudo apt-get install -y kitty exited with 100)",
    ]);
  });
});
