'use client';

import { useState } from 'react';
import { QuestionCard } from './QuestionCard';
import { HistoryList } from './HistoryList';
import { ScoreBar } from './ScoreBar';
import type { Letter, PublicQuestion } from '@/types/questions';
import type { AnswerResponse, HistoryDocument, HistoryResponse } from '@/types/database';

export interface QuizState {
  question: PublicQuestion | null;
  score: number;
  total: number;
  history: HistoryDocument[];
}

interface QuizAppProps {
  initialState: QuizState;
  categories: string[];
}

async function readError(response: Response, fallback: string): Promise<string> {
  try {
    const data: { error?: string } = await response.json();
    return data.error || fallback;
  } catch {
    return fallback;
  }
}

export function QuizApp({ initialState, categories }: QuizAppProps) {
  const [question, setQuestion] = useState<PublicQuestion | null>(initialState.question);
  const [score, setScore] = useState(initialState.score);
  const [total, setTotal] = useState(initialState.total);
  const [history, setHistory] = useState<HistoryDocument[]>(initialState.history);
  const [category, setCategory] = useState('random');
  const [selected, setSelected] = useState<Letter | null>(null);
  const [result, setResult] = useState<AnswerResponse | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  async function handleNewQuestion() {
    setLoading(true);
    setError(null);
    try {
      const form = new FormData();
      form.set('category', category);
      const response = await fetch('/new_question', { method: 'POST', body: form });
      if (!response.ok) {
        throw new Error(await readError(response, 'Failed to load question'));
      }

      const data: PublicQuestion = await response.json();
      setQuestion(data);
      setSelected(null);
      setResult(null);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to load question');
    } finally {
      setLoading(false);
    }
  }

  async function handleAnswer(letter: Letter) {
    if (result || loading) return;

    setSelected(letter);
    setLoading(true);
    setError(null);
    try {
      const form = new FormData();
      form.set('answer', letter);
      const response = await fetch('/update', { method: 'POST', body: form });
      if (!response.ok) {
        throw new Error(await readError(response, 'Failed to submit answer'));
      }

      const data: AnswerResponse = await response.json();
      setResult(data);
      setScore(data.score);
      setTotal(data.total);
    } catch (err) {
      setSelected(null);
      setError(err instanceof Error ? err.message : 'Failed to submit answer');
    } finally {
      setLoading(false);
    }
    await refreshHistory();
  }

  async function refreshHistory() {
    try {
      const response = await fetch('/review_history');
      if (!response.ok) {
        throw new Error(await readError(response, 'Failed to load history'));
      }
      const data: HistoryResponse = await response.json();
      setHistory(data.history);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to load history');
    }
  }

  return (
    <div className="space-y-8">
      <ScoreBar score={score} total={total} />

      <div className="flex flex-col sm:flex-row gap-3">
        <select
          value={category}
          onChange={(e) => setCategory(e.target.value)}
          className="flex-1 p-3 rounded-lg border border-slate-300 bg-white"
        >
          <option value="random">Random category</option>
          {categories.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
        <button
          onClick={handleNewQuestion}
          disabled={loading}
          className="px-6 py-3 bg-blue-600 text-white rounded-lg font-medium hover:bg-blue-700 disabled:opacity-50"
        >
          {loading && !selected ? 'Generating...' : question && !result ? 'Skip question' : 'New question'}
        </button>
      </div>

      {error && (
        <div className="bg-red-50 border border-red-200 rounded-lg p-4 text-red-700">{error}</div>
      )}

      {question ? (
        <QuestionCard
          question={question}
          result={result}
          selected={selected}
          onAnswer={handleAnswer}
          disabled={loading}
        />
      ) : (
        <div className="bg-white rounded-xl shadow-md p-8 text-center text-slate-600">
          Pick a category and request a question to start.
        </div>
      )}

      <section id="history">
        <h2 className="text-2xl font-bold text-slate-800 mb-4">History</h2>
        <HistoryList history={history} />
      </section>
    </div>
  );
}
