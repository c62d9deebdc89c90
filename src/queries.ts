import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ConfigurationError } from "./errors.js";
import type { BackendName, QuerySpec } from "./types.js";

export const THRESHOLD_PLACEHOLDER = "{threshold}";

export interface QueryInfo {
  name: string;
  description: string;
  tags: string[];
}

/**
 * Graph traversal queries over nodes(txId, class) and edges(txId1, txId2).
 * The SQL itself lives in sql/<backend>/<name>.sql.
 *
 * Tags:
 * - hop: fixed-depth join chain
 * - union: several hop depths combined with UNION ALL (partial GPU fallback on Sirius)
 * - recursive: recursive CTE on DuckDB
 */
export const QUERIES: QueryInfo[] = [
  {
    name: "1_hop",
    description: "Transactions directly connected to illicit nodes",
    tags: ["hop"],
  },
  {
    name: "2_hop",
    description: "Transactions two steps away from illicit nodes",
    tags: ["hop"],
  },
  {
    name: "3_hop",
    description: "Transactions three steps away from illicit nodes",
    tags: ["hop"],
  },
  {
    name: "k_hop",
    description: "Transactions within four steps of illicit nodes, with hop distance",
    tags: ["union", "recursive"],
  },
  {
    name: "shortest_path",
    description: "Minimum hop distance from each reachable node to an illicit node",
    tags: ["union", "recursive"],
  },
];

export function findQuery(name: string): QueryInfo | undefined {
  return QUERIES.find((q) => q.name === name);
}

/**
 * Reduce a .sql file to one statement on one line: comment and blank lines are
 * dropped, trailing comments removed and the final semicolon stripped.
 */
export function cleanSql(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/\s--\s.*$/, "").trim())
    .filter((line) => line.length > 0 && !line.startsWith("--"))
    .join(" ")
    .replace(/;\s*$/, "");
}

export function queryPath(sqlDir: string, backend: BackendName, name: string): string {
  return join(sqlDir, backend, `${name}.sql`);
}

/**
 * Read the query template for one backend. A missing file or a template that
 * cannot be varied is a configuration failure.
 */
export function loadQuerySpec(sqlDir: string, backend: BackendName, name: string): QuerySpec {
  const path = queryPath(sqlDir, backend, name);
  if (!existsSync(path)) {
    throw new ConfigurationError([`Query template not found: ${path}`]);
  }
  const template = cleanSql(readFileSync(path, "utf8"));
  if (template.length === 0) {
    throw new ConfigurationError([`Query template is empty: ${path}`]);
  }
  if (!template.includes(THRESHOLD_PLACEHOLDER)) {
    throw new ConfigurationError([
      `Query template has no ${THRESHOLD_PLACEHOLDER} placeholder: ${path}`,
    ]);
  }
  const info = findQuery(name);
  return {
    name,
    description: info?.description ?? name,
    backend,
    template,
    tags: info?.tags ?? [],
  };
}
