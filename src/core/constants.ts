// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import path from 'node:path';
import {type ListrRendererValue} from 'listr2';

// -------------------- bot related constants ----------------------------------------------------------------------
export const HELM_BOT_HOME_DIR = process.env.HELM_BOT_HOME || path.join(os.homedir(), '.helm-bot');
export const HELM_BOT_LOGS_DIR = path.join(HELM_BOT_HOME_DIR, 'logs');
export const HELM_BOT_LOG_FILE = 'helm-bot.log';

export const GIT = 'git';
export const GITHUB_HOST = 'github.com';
export const GITHUB_RAW_CONTENT_URL = 'https://raw.githubusercontent.com';

// -------------------- defaults for the command flags -------------------------------------------------------------
export const DEFAULT_TARGET_BRANCH = 'helm_chart_bump';
export const DEFAULT_BASE_BRANCH = 'main';
export const DEFAULT_MANIFEST_FILE = 'requirements.yaml';
export const DEFAULT_GIT_USER_NAME = 'HelmUpgradeBot';
export const DEFAULT_GIT_USER_EMAIL = 'helm-upgrade-bot@users.noreply.github.com';

// environment variable read when no key vault is configured
export const API_TOKEN_ENV = 'API_TOKEN';

// -------------------- chart index sources ------------------------------------------------------------------------
export const HELM_REPOSITORY_INDEX_FILE = 'index.yaml';
export const CHART_FILE = 'Chart.yaml';
export const REQUIREMENTS_FILE = 'requirements.yaml';

// -------------------- fork polling -------------------------------------------------------------------------------
// GitHub creates forks asynchronously
export const FORK_POLL_MAX_ATTEMPTS = +(process.env.HELM_BOT_FORK_POLL_MAX_ATTEMPTS ?? 10);
export const FORK_POLL_INTERVAL_MS = +(process.env.HELM_BOT_FORK_POLL_INTERVAL_MS ?? 3000);

// -------------------- task rendering -----------------------------------------------------------------------------
export const LISTR_DEFAULT_RENDERER: ListrRendererValue = 'default';
