import type { DatasetFiles } from "./types.js";

/** Single-quoted SQL string literal */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** Both backends load the graph the same way, as nodes and edges tables */
export function loadTableStatements(dataset: DatasetFiles): string[] {
  return [
    `CREATE TABLE nodes AS SELECT * FROM read_csv_auto(${sqlString(dataset.nodesPath)});`,
    `CREATE TABLE edges AS SELECT * FROM read_csv_auto(${sqlString(dataset.edgesPath)});`,
  ];
}
