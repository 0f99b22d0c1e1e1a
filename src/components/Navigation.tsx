import Link from 'next/link';

export function Navigation() {
  return (
    <nav className="bg-slate-800 text-white shadow-lg">
      <div className="max-w-4xl mx-auto px-4">
        <div className="flex items-center justify-between h-16">
          <Link
            href="/"
            className="text-xl font-bold hover:text-slate-300 transition-colors"
          >
            Neuro Quiz
          </Link>
          <div className="flex items-center gap-6">
            <Link
              href="/#history"
              className="hover:text-slate-300 transition-colors font-medium"
            >
              History
            </Link>
          </div>
        </div>
      </div>
    </nav>
  );
}
