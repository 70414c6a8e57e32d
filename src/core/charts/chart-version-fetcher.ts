// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import got from 'got';
import {isMap, isScalar, isSeq, parse, parseDocument, type Scalar} from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import {type BotLogger} from '../logging/bot-logger.js';
import {type RunContext, manifestPath} from '../run-context.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {HelmBotError} from '../errors/helm-bot-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {ResourceNotFoundError} from '../errors/resource-not-found-error.js';
import {UnsupportedChartSourceError} from '../errors/unsupported-chart-source-error.js';
import {type ManifestMutator, versionSource} from './manifest-mutator.js';
import {type ChartDependency} from './chart-version-record.js';
import * as constants from '../constants.js';

type DeploymentCoordinates = Pick<RunContext, 'repoOwner' | 'repoName' | 'baseBranch' | 'chartName' | 'manifestFile'>;

interface IndexEntry {
  readonly version: string;
  readonly created: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Retrieves the versions currently pinned by a deployment and the latest versions published upstream.
 */
@injectable()
export class ChartVersionFetcher {
  private readonly logger: BotLogger;
  private readonly manifestMutator: ManifestMutator;

  public constructor(
    @inject(InjectTokens.BotLogger) logger?: BotLogger,
    @inject(InjectTokens.ManifestMutator) manifestMutator?: ManifestMutator,
  ) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
    this.manifestMutator = patchInject(manifestMutator, InjectTokens.ManifestMutator, this.constructor.name);
  }

  /** GET a text document */
  public async fetchText(url: string): Promise<string> {
    this.logger.debug(`Fetching: ${url}`);
    try {
      return await got(url, {followRedirect: true}).text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error fetching ${url}: ${message}`);
      throw new HelmBotError(`Error fetching ${url}: ${message}`, error);
    }
  }

  public deployedManifestUrl(deployment: DeploymentCoordinates): string {
    const {repoOwner, repoName, baseBranch} = deployment;
    return `${constants.GITHUB_RAW_CONTENT_URL}/${repoOwner}/${repoName}/${baseBranch}/${manifestPath(deployment)}`;
  }

  /** Dependencies pinned by the manifest on the upstream base branch, in document order */
  public async fetchDeployedVersions(deployment: DeploymentCoordinates): Promise<ChartDependency[]> {
    const url = this.deployedManifestUrl(deployment);
    this.logger.info(`Fetching the deployed chart versions from: ${url}`);
    const dependencies = this.manifestMutator.readDependencies(await this.fetchText(url));

    for (const dependency of dependencies) {
      this.logger.info(`Deployed ${dependency.name}: ${dependency.version}`);
    }
    return dependencies;
  }

  /**
   * Latest published version of every dependency.
   *
   * @param overrides - chart name to source URL; takes precedence over the dependency's repository
   */
  public async fetchPublishedVersions(
    dependencies: readonly ChartDependency[],
    overrides: ReadonlyMap<string, string> = new Map(),
  ): Promise<Map<string, string>> {
    const published = new Map<string, string>();
    for (const dependency of dependencies) {
      const url = this.resolveSourceUrl(dependency, overrides);
      this.logger.info(`Fetching the latest ${dependency.name} version from: ${url}`);
      const version = this.parsePublishedVersion(dependency.name, url, await this.fetchText(url));
      this.logger.info(`Published ${dependency.name}: ${version}`);
      published.set(dependency.name, version);
    }
    return published;
  }

  public resolveSourceUrl(dependency: ChartDependency, overrides: ReadonlyMap<string, string>): string {
    const override = overrides.get(dependency.name);
    if (override) {
      this.checkSupported(dependency.name, override);
      return override;
    }

    if (!dependency.repository) {
      throw new UnsupportedChartSourceError(dependency.name, '');
    }

    const url = `${dependency.repository.replace(/\/+$/, '')}/${constants.HELM_REPOSITORY_INDEX_FILE}`;
    this.checkSupported(dependency.name, url);
    return url;
  }

  /** Extracts the version of `chartName` from a document fetched from `url` */
  public parsePublishedVersion(chartName: string, url: string, text: string): string {
    const pathname = new URL(url).pathname;

    if (pathname.endsWith(`/${constants.HELM_REPOSITORY_INDEX_FILE}`)) {
      return this.latestIndexVersion(chartName, url, text);
    }

    if (pathname.endsWith(`/${constants.CHART_FILE}`)) {
      const version = ChartVersionFetcher.parseYaml(url, text).get('version', true);
      if (ChartVersionFetcher.isVersion(version)) {
        return versionSource(text, version);
      }
      throw new ResourceNotFoundError(`No version found in ${url}`, chartName);
    }

    if (pathname.endsWith(`/${constants.REQUIREMENTS_FILE}`)) {
      const dependency = this.manifestMutator.readDependencies(text).find(d => d.name === chartName);
      if (dependency) {
        return dependency.version;
      }
      throw new ResourceNotFoundError(`Chart ${chartName} is not listed in ${url}`, chartName);
    }

    throw new UnsupportedChartSourceError(chartName, url);
  }

  /**
   * Reads a YAML map of chart name to source URL.
   */
  public loadChartSources(file: string): Map<string, string> {
    if (!fs.existsSync(file)) {
      throw new IllegalArgumentError(`Chart sources file does not exist: ${file}`, file);
    }

    const document: unknown = parse(fs.readFileSync(file, 'utf8'));
    if (document === null || document === undefined) {
      return new Map();
    }
    if (!isRecord(document)) {
      throw new IllegalArgumentError(`Chart sources file must contain a mapping of chart names to URLs: ${file}`, file);
    }

    const sources = new Map<string, string>();
    for (const [chartName, url] of Object.entries(document)) {
      if (typeof url !== 'string' || url.trim() === '') {
        throw new IllegalArgumentError(`Chart source of ${chartName} must be a URL`, url);
      }
      sources.set(chartName, url.trim());
    }
    return sources;
  }

  private checkSupported(chartName: string, url: string): void {
    let protocol: string;
    try {
      protocol = new URL(url).protocol;
    } catch (error) {
      throw new IllegalArgumentError(`Chart source of ${chartName} is not a valid URL: ${url}`, url, error);
    }
    if (protocol !== 'https:' && protocol !== 'http:') {
      throw new UnsupportedChartSourceError(chartName, url);
    }
  }

  private latestIndexVersion(chartName: string, url: string, text: string): string {
    const entries = ChartVersionFetcher.parseYaml(url, text).getIn(['entries', chartName], true);
    if (!isSeq(entries)) {
      throw new ResourceNotFoundError(`Chart ${chartName} is not listed in ${url}`, chartName);
    }

    const releases: IndexEntry[] = [];
    for (const entry of entries.items) {
      if (!isMap(entry)) {
        continue;
      }
      const version = entry.get('version', true);
      if (ChartVersionFetcher.isVersion(version)) {
        releases.push({
          version: versionSource(text, version),
          created: ChartVersionFetcher.timestamp(entry.get('created')),
        });
      }
    }
    if (releases.length === 0) {
      throw new ResourceNotFoundError(`Chart ${chartName} has no releases in ${url}`, chartName);
    }

    releases.sort((a, b) => a.created - b.created);
    return releases[releases.length - 1].version;
  }

  private static parseYaml(url: string, text: string): ReturnType<typeof parseDocument> {
    const document = parseDocument(text);
    if (document.errors.length > 0) {
      throw new HelmBotError(`Error parsing ${url}: ${document.errors[0].message}`);
    }
    return document;
  }

  private static isVersion(node: unknown): node is Scalar {
    return isScalar(node) && node.value !== null && node.value !== undefined;
  }

  private static timestamp(created: unknown): number {
    if (created instanceof Date) {
      return created.getTime();
    }
    const parsed = typeof created === 'string' ? Date.parse(created) : Number.NaN;
    return Number.isNaN(parsed) ? 0 : parsed;
  }
}
