'use client';

interface ScoreBarProps {
  score: number;
  total: number;
}

export function ScoreBar({ score, total }: ScoreBarProps) {
  const percentage = total > 0 ? Math.round((score / total) * 100) : 0;

  return (
    <div className="bg-slate-100 rounded-lg p-4 mb-6">
      <div className="flex items-center justify-between mb-2">
        <span className="font-semibold text-slate-800">Score</span>
        <span className="text-sm text-slate-600">
          {score}/{total} ({percentage}%)
        </span>
      </div>
      <div className="w-full bg-slate-300 rounded-full h-2.5">
        <div
          className={`h-2.5 rounded-full transition-all duration-300 ${
            percentage >= 70 ? 'bg-green-500' : percentage >= 40 ? 'bg-yellow-500' : 'bg-red-500'
          }`}
          style={{ width: `${percentage}%` }}
        />
      </div>
    </div>
  );
}
