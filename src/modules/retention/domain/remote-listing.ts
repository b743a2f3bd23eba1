// `rclone ls` prints one object per line: right-aligned size, a space, then the path.
// Backends that cannot report a size print -1.
const LISTING_LINE = /^\s*-?\d+ (.+)$/;

export function parseRemoteListing(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => LISTING_LINE.exec(line)?.[1])
    .filter((name): name is string => name !== undefined && name.length > 0);
}
