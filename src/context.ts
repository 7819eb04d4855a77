import * as fs from 'node:fs';
import type { Context } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';
import type { PullRequestEvent, PushEvent } from '@octokit/webhooks-types';

// The context object will be initialized lazily
let contextInstance: Context | null = null;

/**
 * The SHA git reports for the missing side of a push that creates or deletes a branch.
 */
const NULL_SHA = /^0+$/;

/**
 * Retrieves a required environment variable.
 *
 * @param {string} name - The name of the environment variable to retrieve.
 * @returns {string} The value of the environment variable.
 * @throws {Error} If the environment variable is missing or empty.
 */
function getRequiredEnvironmentVar(name: string): string {
  const value = process.env[name];
  if (!value || typeof value !== 'string') {
    throw new Error(
      `The ${name} environment variable is missing or invalid. This variable is set by GitHub for each workflow run; make sure the action runs inside a GitHub Actions workflow.`,
    );
  }

  return value;
}

/**
 * Runtime check that a payload carries the base and head commits of a pull request.
 */
function isPullRequestEvent(payload: unknown): payload is PullRequestEvent {
  if (typeof payload !== 'object' || payload === null || !('pull_request' in payload)) {
    return false;
  }

  const { pull_request: pullRequest } = payload;
  return (
    typeof pullRequest === 'object' &&
    pullRequest !== null &&
    'base' in pullRequest &&
    'head' in pullRequest &&
    typeof pullRequest.base === 'object' &&
    pullRequest.base !== null &&
    'sha' in pullRequest.base &&
    typeof pullRequest.base.sha === 'string' &&
    typeof pullRequest.head === 'object' &&
    pullRequest.head !== null &&
    'sha' in pullRequest.head &&
    typeof pullRequest.head.sha === 'string'
  );
}

/**
 * Runtime check that a payload carries the before and after commits of a push.
 */
function isPushEvent(payload: unknown): payload is PushEvent {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'before' in payload &&
    'after' in payload &&
    typeof payload.before === 'string' &&
    typeof payload.after === 'string'
  );
}

/**
 * Number of commits a push event lists.
 */
function getPushedCommitCount(payload: PushEvent): number {
  return Array.isArray(payload.commits) ? payload.commits.length : 0;
}

/**
 * Derives the revision range of the commits an event introduces.
 *
 * A push that creates a branch has no base to compare with: its range is the new head, limited to
 * the number of pushed commits by {@link getEventMaxCount}.
 *
 * @param eventName - The value of GITHUB_EVENT_NAME
 * @param payload - The parsed event payload
 * @returns `<base>..<head>` for pull requests, `<before>..<after>` or `<after>` for pushes,
 *   otherwise `null`
 */
export function getEventRevRange(eventName: string, payload: unknown): string | null {
  if ((eventName === 'pull_request' || eventName === 'pull_request_target') && isPullRequestEvent(payload)) {
    return `${payload.pull_request.base.sha}..${payload.pull_request.head.sha}`;
  }

  if (eventName === 'push' && isPushEvent(payload)) {
    if (NULL_SHA.test(payload.after)) {
      return null;
    }
    if (NULL_SHA.test(payload.before)) {
      return getPushedCommitCount(payload) > 0 ? payload.after : null;
    }
    return `${payload.before}..${payload.after}`;
  }

  return null;
}

/**
 * The number of commits to read from the event's revision range: the pushed commits of a push that
 * creates a branch, otherwise `null`.
 */
export function getEventMaxCount(eventName: string, payload: unknown): number | null {
  if (eventName !== 'push' || !isPushEvent(payload) || getEventRevRange(eventName, payload) === null) {
    return null;
  }

  return NULL_SHA.test(payload.before) ? getPushedCommitCount(payload) : null;
}

/**
 * Clears the cached context instance during testing.
 *
 * Only takes effect when NODE_ENV is 'test'.
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Lazily initializes the workflow context. The context is only created once and reused for
 * subsequent calls.
 *
 * @returns {Context} The workflow context.
 * @throws {Error} If a required GitHub environment variable is missing or the event payload cannot be read.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const eventName = getRequiredEnvironmentVar('GITHUB_EVENT_NAME');
    const repository = getRequiredEnvironmentVar('GITHUB_REPOSITORY');
    const eventPath = getRequiredEnvironmentVar('GITHUB_EVENT_PATH');
    const workspaceDir = getRequiredEnvironmentVar('GITHUB_WORKSPACE');

    if (!fs.existsSync(eventPath)) {
      throw new Error(`Specified GITHUB_EVENT_PATH ${eventPath} does not exist`);
    }

    const payload: unknown = JSON.parse(fs.readFileSync(eventPath, { encoding: 'utf8' }));

    contextInstance = {
      eventName,
      repository,
      workspaceDir,
      eventRevRange: getEventRevRange(eventName, payload),
      eventMaxCount: getEventMaxCount(eventName, payload),
    };

    info(`Event Name: ${contextInstance.eventName}`);
    info(`Repository: ${contextInstance.repository}`);
    info(`Workspace Directory: ${contextInstance.workspaceDir}`);
    info(`Event Revision Range: ${contextInstance.eventRevRange ?? 'none'}`);
    if (contextInstance.eventMaxCount !== null) {
      info(`Event Commit Count: ${contextInstance.eventMaxCount}`);
    }

    return contextInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the context that initializes on first use
export const getContext = (): Context => {
  return initializeContext();
};
