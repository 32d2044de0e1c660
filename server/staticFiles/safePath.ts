import path, { type PlatformPath } from "path";

export type PathComponent =
  | { kind: "prefix"; value: string }
  | { kind: "root" }
  | { kind: "current" }
  | { kind: "parent" }
  | { kind: "normal"; value: string };

// Device and verbatim (\\?\, \\.\), UNC (\\server\share) and drive (C:) prefixes.
const WINDOWS_PREFIX = /^(?:[\\/]{2}[?.][\\/][^\\/]*|[\\/]{2}[^\\/]+[\\/][^\\/]+|[A-Za-z]:)/;
const WINDOWS_DRIVE_SEGMENT = /^[A-Za-z]:/;
const WINDOWS_SEPARATORS = /[\\/]/;
const POSIX_SEPARATORS = /\//;

function isWindows(platform: PlatformPath): boolean {
  return platform.sep === "\\";
}

/**
 * Splits a path into typed components following the separator rules of
 * `platform` (the host's by default). Repeated separators collapse.
 */
export function pathComponents(input: string, platform: PlatformPath = path): PathComponent[] {
  const windows = isWindows(platform);
  const separators = windows ? WINDOWS_SEPARATORS : POSIX_SEPARATORS;
  const components: PathComponent[] = [];
  let rest = input;

  if (windows) {
    const prefix = WINDOWS_PREFIX.exec(rest);
    if (prefix) {
      components.push({ kind: "prefix", value: prefix[0] });
      rest = rest.slice(prefix[0].length);
    }
  }

  if (separators.test(rest.charAt(0))) {
    components.push({ kind: "root" });
  }

  for (const segment of rest.split(separators)) {
    if (segment === "") continue;
    if (segment === ".") {
      components.push({ kind: "current" });
    } else if (segment === "..") {
      components.push({ kind: "parent" });
    } else if (windows && WINDOWS_DRIVE_SEGMENT.test(segment)) {
      // A drive designator is rejected wherever it appears, not just up front.
      components.push({ kind: "prefix", value: segment });
    } else {
      components.push({ kind: "normal", value: segment });
    }
  }

  return components;
}

/**
 * Whitelist check: only `.` and plain named segments are allowed. Nothing is
 * normalized first, so `a/../a/file` is refused even though it stays inside.
 */
export function isSafePath(input: string, platform: PlatformPath = path): boolean {
  return pathComponents(input, platform).every(
    (component) => component.kind === "current" || component.kind === "normal"
  );
}
