// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {isMap, isScalar, isSeq, parseDocument, Scalar, type YAMLMap} from 'yaml';
import {ManifestFormatError} from '../errors/manifest-format-error.js';
import {type ChartDependency, type VersionMap} from './chart-version-record.js';

const DEPENDENCIES_KEY = 'dependencies';

interface Splice {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/** a version scalar as written, so that `1.10` is not read back as the number 1.1 */
export function versionSource(text: string, scalar: Scalar): string {
  if (scalar.type === Scalar.PLAIN && scalar.range) {
    return text.slice(scalar.range[0], scalar.range[1]).trim();
  }
  return String(scalar.value);
}

/**
 * Reads and patches the `dependencies` list of a chart manifest (requirements.yaml or Chart.yaml).
 *
 * Patching works on the source text: only the bytes of each targeted `version` value are replaced, so comments,
 * key order, indentation and unrelated fields stay as they were.
 */
@injectable()
export class ManifestMutator {
  public readDependencies(text: string): ChartDependency[] {
    return this.dependencyEntries(text).map(({name, entry}) => {
      const repository = entry.get('repository');
      return {
        name,
        version: versionSource(text, this.versionScalar(entry, name)),
        ...(typeof repository === 'string' ? {repository} : {}),
      };
    });
  }

  /**
   * Returns the manifest with the version of every chart in `versions` replaced.
   * @throws ManifestFormatError when the list, an entry or its version is missing
   */
  public patchManifest(text: string, versions: VersionMap): string {
    const entries = new Map<string, YAMLMap>();
    for (const {name, entry} of this.dependencyEntries(text)) {
      if (!entries.has(name)) {
        entries.set(name, entry);
      }
    }

    const splices: Splice[] = [];
    for (const [chartName, version] of versions) {
      const entry = entries.get(chartName);
      if (entry === undefined) {
        throw new ManifestFormatError(
          `Chart ${chartName} is not listed in the manifest dependencies`,
          `${DEPENDENCIES_KEY}[${chartName}]`,
        );
      }

      const scalar = this.versionScalar(entry, chartName);
      const range = scalar.range;
      if (!range) {
        throw new ManifestFormatError(
          `Version of ${chartName} has no source position`,
          `${DEPENDENCIES_KEY}[${chartName}].version`,
        );
      }
      splices.push({start: range[0], end: range[1], text: ManifestMutator.quote(version, scalar.type)});
    }

    // apply from the end of the document so earlier offsets stay valid
    splices.sort((a, b) => b.start - a.start);
    let patched = text;
    for (const splice of splices) {
      patched = patched.slice(0, splice.start) + splice.text + patched.slice(splice.end);
    }
    return patched;
  }

  private parse(text: string): ReturnType<typeof parseDocument> {
    const document = parseDocument(text);
    if (document.errors.length > 0) {
      throw new ManifestFormatError(`Manifest is not valid YAML: ${document.errors[0].message}`, '');
    }
    return document;
  }

  private dependencyEntries(text: string): {name: string; entry: YAMLMap}[] {
    const dependencies = this.parse(text).get(DEPENDENCIES_KEY, true);
    if (!isSeq(dependencies)) {
      throw new ManifestFormatError(`Manifest has no '${DEPENDENCIES_KEY}' list`, DEPENDENCIES_KEY);
    }

    return dependencies.items.map((item, index) => {
      if (!isMap(item)) {
        throw new ManifestFormatError('Dependency entry is not a mapping', `${DEPENDENCIES_KEY}[${index}]`);
      }
      const name = item.get('name');
      if (typeof name !== 'string' || name === '') {
        throw new ManifestFormatError('Dependency entry has no name', `${DEPENDENCIES_KEY}[${index}].name`);
      }
      return {name, entry: item};
    });
  }

  private versionScalar(entry: YAMLMap, chartName: string): Scalar {
    const version = entry.get('version', true);
    if (!isScalar(version) || version.value === null) {
      throw new ManifestFormatError(
        `Dependency ${chartName} has no version`,
        `${DEPENDENCIES_KEY}[${chartName}].version`,
      );
    }
    return version;
  }

  private static quote(version: string, type: Scalar['type']): string {
    switch (type) {
      case Scalar.QUOTE_DOUBLE: {
        return JSON.stringify(version);
      }
      case Scalar.QUOTE_SINGLE: {
        return `'${version.replaceAll("'", "''")}'`;
      }
      default: {
        return version;
      }
    }
  }
}
