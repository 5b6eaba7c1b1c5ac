import { relative } from "node:path";

export function relativeToRoot(root: string, target: string): string {
  return relative(root, target) || ".";
}
