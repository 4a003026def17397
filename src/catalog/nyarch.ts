import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { assetPath } from "../apply/mutations";
import type {
  ApplyContext,
  MutationGroup,
  RunInstallerMutation,
} from "../core/types";
import { findOnPath, isDirectory } from "../core/utils";

const SKEL = "etc/skel";

export const BASE_DEPENDENCIES = [
  "curl",
  "wget",
  "tar",
  "flatpak",
  "plasma-discover-backend-flatpak",
];

export const MATERIAL_YOU_DEPENDENCIES = [
  "pipx",
  "build-essential",
  "python3-dev",
  "pkg-config",
  "python-dbus-dev",
  "libglib2.0-dev",
  "qml6-module-qt-labs-settings",
  "git",
  "kpackagetool6",
];

export const PLASMOID_ID = "luisbocanegra.kde-material-you-colors";
const PLASMOID_REPO =
  "https://github.com/luisbocanegra/kde-material-you-colors.git";

export const WALLPAPER_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp"];

export const SUGGESTED_FLATPAKS = [
  "org.gtk.Gtk3theme.adw-gtk3",
  "org.gtk.Gtk3theme.adw-gtk3-dark",
  "info.febvre.Komikku",
  "com.github.tchx84.Flatseal",
  "de.haeckerfelix.Shortwave",
  "org.gnome.Lollypop",
  "de.haeckerfelix.Fragments",
  "com.mattjakeman.ExtensionManager",
  "it.mijorus.gearlever",
];

export const NYARCH_BUNDLES = [
  { name: "catgirldownloader", repo: "catgirldownloader" },
  { name: "waifudownloader", repo: "waifudownloader" },
  { name: "nyarchassistant", repo: "nyarchassistant" },
];

export const FETCH_TOOLS = ["nekofetch", "nyaofetch"];

export const PATH_MARKER =
  "# Nyarch KDE installer: ensure ~/.local/bin is on PATH";
export const PYWAL_MARKER = "# Nyarch KDE installer: pywal color sequences";

function aptUpdate(
  id: string,
  isApplied?: (ctx: ApplyContext) => boolean,
): RunInstallerMutation {
  return {
    kind: "run_installer",
    id,
    description: "Refresh the APT package index",
    command: "apt-get",
    args: ["update", "-qq"],
    sudo: true,
    ...(isApplied ? { isApplied } : {}),
  };
}

function kittyOnPath(ctx: ApplyContext): boolean {
  return findOnPath("kitty", ctx.env) !== undefined;
}

function aptInstall(
  id: string,
  description: string,
  packages: string[],
): RunInstallerMutation {
  return {
    kind: "run_installer",
    id,
    description,
    command: "apt-get",
    args: ["install", "-y", ...[...new Set(packages)].sort()],
    sudo: true,
  };
}

function plasmoidCloneDir(ctx: ApplyContext): string {
  return join(ctx.cacheRoot, "kde-material-you-colors");
}

function plasmoidPackageDir(ctx: ApplyContext): string {
  return join(plasmoidCloneDir(ctx), "src", "plasmoid", "package");
}

function plasmoidInstalled(ctx: ApplyContext): boolean {
  return [
    join(ctx.home, ".local", "share", "plasma", "plasmoids", PLASMOID_ID),
    join("/usr", "share", "plasma", "plasmoids", PLASMOID_ID),
  ].some(isDirectory);
}

function sameBytes(a: string, b: string): boolean {
  if (!existsSync(a) || !existsSync(b)) return false;
  return readFileSync(a).equals(readFileSync(b));
}

function fetchToolInstall(name: string): RunInstallerMutation {
  const dest = `/usr/bin/${name}`;
  return {
    kind: "run_installer",
    id: `install-${name}`,
    description: `Install ${name} into /usr/bin`,
    command: "install",
    args: (ctx) => [
      "-m",
      "0755",
      assetPath(ctx, `usr/local/bin/${name}`),
      dest,
    ],
    sudo: true,
    isApplied: (ctx) =>
      ctx.layoutRoot !== null &&
      sameBytes(join(ctx.layoutRoot, "usr", "local", "bin", name), dest),
  };
}

function bundleDownload(name: string, repo: string): RunInstallerMutation[] {
  const dir = (ctx: ApplyContext) => join(ctx.cacheRoot, "flatpaks");
  return [
    {
      kind: "run_installer",
      id: `download-${name}`,
      description: `Download the ${name} bundle`,
      command: "wget",
      args: (ctx) => [
        "-q",
        "-N",
        "-P",
        dir(ctx),
        `https://github.com/nyarchlinux/${repo}/releases/latest/download/${name}.flatpak`,
      ],
    },
    {
      kind: "run_installer",
      id: `install-${name}`,
      description: `Install the ${name} bundle`,
      command: "flatpak",
      args: (ctx) => ["install", "-y", join(dir(ctx), `${name}.flatpak`)],
      sudo: true,
    },
  ];
}

/** Menu order is execution order. Target paths here are a public contract. */
export const NYARCH_CATALOG: MutationGroup[] = [
  {
    id: "base",
    label: "Base dependencies (curl, wget, tar, flatpak)",
    scope: "system",
    needsAssets: false,
    mutations: [
      aptUpdate("apt-update"),
      aptInstall("apt-base", "Install base packages", BASE_DEPENDENCIES),
    ],
  },
  {
    id: "user",
    label:
      "Full user theming (wallpapers, Material You backend + widget, icons, GTK themes, Pywal hook, Flatpak GTK overrides)",
    scope: "user",
    needsAssets: true,
    mutations: [
      {
        kind: "copy_tree",
        id: "wallpapers",
        description: "Install wallpapers",
        target: "~/.local/share/wallpapers/nyarch",
        source: { asset: `${SKEL}/.local/share/backgrounds` },
        extensions: WALLPAPER_EXTENSIONS,
      },
      aptUpdate("apt-update"),
      aptInstall(
        "material-you-deps",
        "Install Material You build dependencies",
        MATERIAL_YOU_DEPENDENCIES,
      ),
      {
        kind: "append_snippet",
        id: "local-bin-path",
        description: "Put ~/.local/bin on PATH for login shells",
        target: "~/.profile",
        marker: PATH_MARKER,
        body: 'export PATH="$HOME/.local/bin:$PATH"',
        conflictHint: ".local/bin",
      },
      {
        kind: "run_installer",
        id: "material-you-backend",
        description: "Install kde-material-you-colors with pipx",
        command: "pipx",
        args: ["install", "kde-material-you-colors"],
        isApplied: (ctx) =>
          isDirectory(
            join(ctx.home, ".local/share/pipx/venvs/kde-material-you-colors"),
          ),
      },
      {
        kind: "run_installer",
        id: "material-you-pywal",
        description: "Add pywal16 to the Material You environment",
        command: "pipx",
        args: ["inject", "kde-material-you-colors", "pywal16"],
        allowFailure: true,
      },
      {
        kind: "run_installer",
        id: "material-you-config",
        description: "Write the default kde-material-you-colors configuration",
        command: "kde-material-you-colors",
        args: ["-c"],
        allowFailure: true,
      },
      {
        kind: "run_installer",
        id: "material-you-autostart",
        description: "Start kde-material-you-colors on login",
        command: "kde-material-you-colors",
        args: ["-a"],
        allowFailure: true,
      },
      {
        kind: "run_installer",
        id: "plasmoid-clone",
        description: "Fetch the Material You Colors widget",
        command: "git",
        args: (ctx) => [
          "clone",
          "--depth",
          "1",
          PLASMOID_REPO,
          plasmoidCloneDir(ctx),
        ],
        isApplied: (ctx) =>
          plasmoidInstalled(ctx) ||
          isDirectory(join(plasmoidCloneDir(ctx), ".git")),
      },
      {
        kind: "run_installer",
        id: "plasmoid-install",
        description: "Install the Material You Colors widget",
        command: "kpackagetool6",
        args: (ctx) => [
          "--type",
          "Plasma/Applet",
          "--install",
          plasmoidPackageDir(ctx),
        ],
        fallbackArgs: (ctx) => [
          "--type",
          "Plasma/Applet",
          "--upgrade",
          plasmoidPackageDir(ctx),
        ],
        isApplied: plasmoidInstalled,
      },
      {
        kind: "copy_tree",
        id: "icons",
        description: "Install the Tela-circle-MaterialYou icon theme",
        target: "~/.local/share/icons/Tela-circle-MaterialYou",
        source: { asset: `${SKEL}/.local/share/icons/Tela-circle-MaterialYou` },
      },
      {
        kind: "copy_tree",
        id: "gtk-themes",
        description: "Install GTK themes",
        target: "~/.local/share/themes",
        source: { asset: `${SKEL}/.local/share/themes` },
      },
      {
        kind: "copy_tree",
        id: "gtk3-config",
        description: "Install the GTK 3 configuration",
        target: "~/.config/gtk-3.0",
        source: { asset: `${SKEL}/.config/gtk-3.0` },
      },
      {
        kind: "copy_tree",
        id: "gtk4-config",
        description: "Install the GTK 4 configuration",
        target: "~/.config/gtk-4.0",
        source: { asset: `${SKEL}/.config/gtk-4.0` },
      },
      {
        kind: "append_snippet",
        id: "pywal-bashrc",
        description: "Replay Pywal colour sequences in new bash shells",
        target: "~/.bashrc",
        marker: PYWAL_MARKER,
        body: [
          'if [[ -f "$HOME/.cache/wal/sequences" ]]; then',
          '    (cat "$HOME/.cache/wal/sequences")',
          "fi",
        ].join("\n"),
        conflictHint: "wal/sequences",
      },
      {
        kind: "run_installer",
        id: "flatpak-gtk3-override",
        description: "Let Flatpak apps read the GTK 3 configuration",
        command: "flatpak",
        args: ["override", "--filesystem=xdg-config/gtk-3.0"],
        sudo: true,
      },
      {
        kind: "run_installer",
        id: "flatpak-gtk4-override",
        description: "Let Flatpak apps read the GTK 4 configuration",
        command: "flatpak",
        args: ["override", "--filesystem=xdg-config/gtk-4.0"],
        sudo: true,
      },
    ],
  },
  {
    id: "kitty",
    label: "Kitty terminal with the Nyarch configuration",
    scope: "system",
    needsAssets: true,
    mutations: [
      aptUpdate("apt-update", kittyOnPath),
      {
        ...aptInstall("kitty-package", "Install kitty", ["kitty"]),
        isApplied: kittyOnPath,
      },
      {
        kind: "write_file",
        id: "kitty-config",
        description: "Install kitty.conf",
        target: "~/.config/kitty/kitty.conf",
        source: { asset: `${SKEL}/.config/kitty/kitty.conf` },
      },
    ],
  },
  {
    id: "fetch",
    label: "Nekofetch and Nyaofetch, plus the fastfetch configuration",
    scope: "system",
    needsAssets: true,
    mutations: [
      ...FETCH_TOOLS.map(fetchToolInstall),
      {
        kind: "copy_tree",
        id: "fastfetch-config",
        description: "Install the fastfetch configuration",
        target: "~/.config/fastfetch",
        source: { asset: `${SKEL}/.config/fastfetch` },
        backup: "archive",
      },
    ],
  },
  {
    id: "flatpaks",
    label: "Suggested Flatpak applications",
    scope: "system",
    needsAssets: false,
    mutations: [
      {
        kind: "run_installer",
        id: "flathub-remote",
        description: "Add the Flathub remote",
        command: "flatpak",
        args: [
          "remote-add",
          "--if-not-exists",
          "flathub",
          "https://flathub.org/repo/flathub.flatpakrepo",
        ],
      },
      {
        kind: "run_installer",
        id: "suggested-apps",
        description: "Install the suggested applications",
        command: "flatpak",
        args: ["install", "-y", "flathub", ...SUGGESTED_FLATPAKS],
      },
    ],
  },
  {
    id: "nyarch-apps",
    label: "Nyarch apps (Catgirl Downloader, Waifu Downloader, Nyarch Assistant)",
    scope: "system",
    needsAssets: false,
    mutations: NYARCH_BUNDLES.flatMap((b) => bundleDownload(b.name, b.repo)),
  },
];
