export interface Release {
  tag: string;
  archiveUrl: string;
}

export interface CacheEntry {
  tag: string;
  extractedPath: string;
  fromCache: boolean;
}

/** Path relative to the asset layout root of a cache entry. */
export interface AssetRef {
  asset: string;
}

export interface LiteralSource {
  literal: string;
}

export type BackupStrategy = "rename" | "archive";

interface MutationBase {
  /** Stable idempotency key, unique within its group. */
  id: string;
  description: string;
}

export interface CopyTreeMutation extends MutationBase {
  kind: "copy_tree";
  /** `~/`-prefixed paths resolve against the user's home. */
  target: string;
  source: AssetRef;
  /** Lower-case extensions including the dot; omit to copy every file. */
  extensions?: string[];
  backup?: BackupStrategy;
}

export interface WriteFileMutation extends MutationBase {
  kind: "write_file";
  target: string;
  source: AssetRef | LiteralSource;
  mode?: number;
  backup?: BackupStrategy;
}

export interface AppendSnippetMutation extends MutationBase {
  kind: "append_snippet";
  target: string;
  marker: string;
  body: string;
  /** Text that signals the user already wired this up by hand. */
  conflictHint?: string;
}

export interface RunInstallerMutation extends MutationBase {
  kind: "run_installer";
  command: string;
  args: string[] | ((ctx: ApplyContext) => string[]);
  sudo?: boolean;
  /** Also covers a command that cannot be started. */
  allowFailure?: boolean;
  /** Tried once when the first attempt exits non-zero. */
  fallbackArgs?: string[] | ((ctx: ApplyContext) => string[]);
  isApplied?: (ctx: ApplyContext) => boolean;
}

export type Mutation =
  | CopyTreeMutation
  | WriteFileMutation
  | AppendSnippetMutation
  | RunInstallerMutation;

export type GroupScope = "user" | "system";

export interface MutationGroup {
  id: string;
  label: string;
  scope: GroupScope;
  needsAssets: boolean;
  mutations: Mutation[];
}

export type MutationStatus = "success" | "skipped" | "failed";

export interface MutationResult {
  id: string;
  group: string;
  status: MutationStatus;
  detail: string;
  backupPath?: string;
}

export interface ToolInvocation {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Runs an external program and resolves with its exit code. */
export type ToolRunner = (invocation: ToolInvocation) => Promise<number>;

export interface ApplyContext {
  home: string;
  cacheRoot: string;
  /** Directory asset references resolve against; null when no release was fetched. */
  layoutRoot: string | null;
  dryRun: boolean;
  env: NodeJS.ProcessEnv;
  runner: ToolRunner;
  now: () => Date;
}
