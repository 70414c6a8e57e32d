// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type BotLogger} from '../logging/bot-logger.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type ChartVersionRecord, type VersionMap} from './chart-version-record.js';

@injectable()
export class VersionComparator {
  private readonly logger: BotLogger;

  public constructor(@inject(InjectTokens.BotLogger) logger?: BotLogger) {
    this.logger = patchInject(logger, InjectTokens.BotLogger, this.constructor.name);
  }

  /**
   * Names of the charts whose published version differs from the deployed one, in the order of `deployed`.
   * Versions are compared as plain strings, so a lower published version counts as a change.
   *
   * @param deploymentChart - the deployment's own chart, never part of the result
   */
  public findChartsToUpgrade(deployed: VersionMap, published: VersionMap, deploymentChart: string): string[] {
    const charts: string[] = [];
    for (const [chart, deployedVersion] of deployed) {
      if (chart === deploymentChart) {
        continue;
      }
      const publishedVersion = published.get(chart);
      if (publishedVersion !== undefined && publishedVersion !== deployedVersion) {
        charts.push(chart);
      }
    }
    return charts;
  }

  public buildVersionRecords(deployed: VersionMap, published: VersionMap): ReadonlyMap<string, ChartVersionRecord> {
    const records = new Map<string, ChartVersionRecord>();
    for (const [chartName, deployedVersion] of deployed) {
      const publishedVersion = published.get(chartName);
      if (publishedVersion !== undefined) {
        records.set(chartName, Object.freeze({chartName, deployedVersion, publishedVersion}));
      }
    }
    return records;
  }

  /** Logs the outcome of a comparison and returns the logged message */
  public reportUpgrades(deploymentChart: string, charts: readonly string[], dryRun: boolean): string {
    let message: string;
    if (charts.length === 0) {
      message = `${deploymentChart} is up-to-date with all current chart dependency releases!`;
    } else if (dryRun) {
      message =
        `Helm upgrade required for the following charts: ${charts.join(', ')}. ` +
        "PR won't be opened due to --dry-run flag being set.";
    } else {
      message = `Helm upgrade required for the following charts: ${charts.join(', ')}`;
    }

    this.logger.info(message);
    return message;
  }
}
