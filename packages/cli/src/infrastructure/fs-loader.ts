import { existsSync, readFileSync, statSync } from "node:fs";

export type GraphFile = {
  path: string;
  raw: string;
};

export const loadGraphFile = (graphPath: string): GraphFile | null => {
  if (!existsSync(graphPath) || !statSync(graphPath).isFile()) {
    return null;
  }

  return {
    path: graphPath,
    raw: readFileSync(graphPath, "utf8"),
  };
};
