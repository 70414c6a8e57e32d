// SPDX-License-Identifier: Apache-2.0

/** A dependency entry of a chart manifest */
export interface ChartDependency {
  readonly name: string;
  readonly version: string;
  readonly repository?: string;
}

export interface ChartVersionRecord {
  readonly chartName: string;
  readonly deployedVersion: string;
  readonly publishedVersion: string;
}

/** chart name to version */
export type VersionMap = ReadonlyMap<string, string>;
