import { PENDING_AUTOMATION_STATUSES } from '@pressplay/models';
import type { AutomationJob } from '@pressplay/models';

import { memoizeLast } from './memo';

type AutomationQueue = readonly AutomationJob[] | null | undefined;

/** First queue entry being compressed right now, if any. */
export const selectActiveAutomationJob = (queue: AutomationQueue): AutomationJob | null =>
  queue?.find(job => job.status === 'compressing') ?? null;

export const countPendingAutomationJobs = (queue: AutomationQueue): number =>
  queue ? queue.filter(job => PENDING_AUTOMATION_STATUSES.has(job.status)).length : 0;

export interface AutomationQueueViews {
  activeJob: (queue: AutomationQueue) => AutomationJob | null;
  pendingCount: (queue: AutomationQueue) => number;
}

export const createAutomationQueueViews = (): AutomationQueueViews => ({
  activeJob: memoizeLast(selectActiveAutomationJob),
  pendingCount: memoizeLast(countPendingAutomationJobs)
});
