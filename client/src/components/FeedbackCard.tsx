import { useState } from 'react';
import { Loader2, Send } from 'lucide-react';
import { useFeedback } from '@/hooks/useFeedback';
import type { FeedbackSubmitter } from '@/lib/feedback/feedbackSubmitter';

interface FeedbackCardProps {
  submitter: FeedbackSubmitter;
}

export function FeedbackCard({ submitter }: FeedbackCardProps) {
  const [text, setText] = useState('');
  const { statusText, isSubmitting, controlEnabled, submit } = useFeedback(submitter);

  return (
    <section className="space-y-3 rounded-lg border border-slate-200 bg-white p-4">
      <label htmlFor="feedback-text" className="block text-sm font-medium">
        Please share your feedback on current features and wanted features
      </label>
      <textarea
        id="feedback-text"
        value={text}
        placeholder="Input your feedback here"
        onChange={(event) => setText(event.target.value)}
        rows={3}
        className="w-full rounded-md border border-slate-300 px-2 py-1.5 text-sm"
      />
      <button
        type="button"
        onClick={() => submit(text)}
        disabled={!controlEnabled}
        className="inline-flex items-center gap-2 rounded-md bg-blue-600 px-3 py-1.5 text-sm font-medium text-white hover:bg-blue-700 disabled:opacity-60"
      >
        {isSubmitting ? <Loader2 className="h-4 w-4 animate-spin" /> : <Send className="h-4 w-4" />}
        {isSubmitting ? 'Submitting…' : 'Submit Feedback'}
      </button>
      <pre role="status" className="min-h-[1.5rem] whitespace-pre-wrap font-mono text-xs text-slate-700">
        {statusText}
      </pre>
    </section>
  );
}
