'use client';

import { LETTERS, type Letter, type PublicQuestion } from '@/types/questions';
import type { AnswerResponse } from '@/types/database';

interface QuestionCardProps {
  question: PublicQuestion;
  result: AnswerResponse | null;
  selected: Letter | null;
  onAnswer: (letter: Letter) => void;
  disabled?: boolean;
}

export function QuestionCard({ question, result, selected, onAnswer, disabled = false }: QuestionCardProps) {
  function getChoiceClassName(letter: Letter): string {
    const base = 'w-full text-left p-4 rounded-lg border-2 transition-colors';

    if (!result) {
      if (letter === selected) {
        return `${base} border-blue-400 bg-blue-50`;
      }
      return `${base} border-slate-200 bg-white hover:border-blue-400 hover:bg-blue-50 cursor-pointer`;
    }

    if (letter === result.correct_answer) {
      return `${base} border-green-500 bg-green-50 text-green-800`;
    }

    if (letter === selected && !result.correct) {
      return `${base} border-red-500 bg-red-50 text-red-800`;
    }

    return `${base} border-slate-200 bg-white opacity-50`;
  }

  return (
    <div className="bg-white rounded-xl shadow-md p-8">
      {question.category && (
        <span className="inline-block mb-4 px-3 py-1 rounded-full bg-slate-100 text-slate-600 text-sm">
          {question.category}
        </span>
      )}
      <h2 className="text-xl font-semibold text-slate-800 mb-6">{question.question}</h2>

      <div className="space-y-3">
        {question.choices.map((choice, index) => {
          const letter = LETTERS[index];
          if (!letter) return null;
          return (
            <button
              key={letter}
              onClick={() => onAnswer(letter)}
              disabled={disabled || result !== null}
              className={getChoiceClassName(letter)}
            >
              {choice}
            </button>
          );
        })}
      </div>

      {result && (
        <div
          className={`mt-6 p-4 rounded-lg ${
            result.correct ? 'bg-green-100 text-green-800' : 'bg-red-100 text-red-800'
          }`}
        >
          {result.feedback}
        </div>
      )}
    </div>
  );
}
