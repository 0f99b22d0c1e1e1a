'use client';

import type { HistoryDocument } from '@/types/database';

interface HistoryListProps {
  history: HistoryDocument[];
}

export function HistoryList({ history }: HistoryListProps) {
  if (history.length === 0) {
    return <p className="text-slate-500">No answered questions yet.</p>;
  }

  return (
    <ol className="space-y-4">
      {history.map((entry, index) => (
        <li key={index} className="bg-white rounded-lg shadow-sm p-4">
          <div className="flex items-start justify-between gap-4">
            <p className="font-medium text-slate-800">{entry.question}</p>
            <span className={entry.is_correct ? 'text-green-600' : 'text-red-600'}>
              {entry.is_correct ? '✓' : '✗'}
            </span>
          </div>
          <p className="text-sm text-slate-600 mt-2">
            Your answer: {entry.user_answer} · Correct answer: {entry.correct_answer}
          </p>
          <p className="text-sm text-slate-700 mt-2">{entry.feedback}</p>
        </li>
      ))}
    </ol>
  );
}
