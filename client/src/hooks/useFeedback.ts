/**
 * useFeedback Hook
 * Exposes the feedback submitter's snapshot and raises a toast for every
 * terminal outcome.
 */

import { useCallback, useSyncExternalStore } from 'react';
import { toast } from 'sonner';
import type { FeedbackSubmitter } from '@/lib/feedback/feedbackSubmitter';
import { describeFeedbackStatus, type FeedbackNotification } from '@/lib/feedback/feedbackStatus';

function showNotification(notification: FeedbackNotification): void {
  const options = notification.durationMs === undefined ? undefined : { duration: notification.durationMs };
  switch (notification.type) {
    case 'warning':
      toast.warning(notification.message, options);
      break;
    case 'success':
      toast.success(notification.message, options);
      break;
    case 'error':
      toast.error(notification.message, options);
      break;
  }
}

export function useFeedback(submitter: FeedbackSubmitter) {
  const snapshot = useSyncExternalStore(submitter.subscribe, submitter.getSnapshot);
  const { statusText } = describeFeedbackStatus(snapshot.status);

  const submit = useCallback((text: string) => {
    submitter
      .submit(text)
      .then((status) => {
        if (status.kind === 'Submitting') return;
        const { notification } = describeFeedbackStatus(status);
        if (notification) showNotification(notification);
      })
      .catch((error: unknown) => {
        console.error('[feedback] Submission failed:', error);
      });
  }, [submitter]);

  return {
    ...snapshot,
    statusText,
    isSubmitting: snapshot.status.kind === 'Submitting',
    submit
  };
}
