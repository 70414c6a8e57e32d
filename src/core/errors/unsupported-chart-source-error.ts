// SPDX-License-Identifier: Apache-2.0

import {HelmBotError} from './helm-bot-error.js';

export class UnsupportedChartSourceError extends HelmBotError {
  public constructor(chartName: string, url: string) {
    super(`Fetching versions from the following URL type is not supported for '${chartName}': ${url}`, undefined, {
      chartName,
      url,
    });
  }
}
