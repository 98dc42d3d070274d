'use client';

import { useEffect, useState } from 'react';
import { useRouter } from 'next/navigation';
import ProgressBar from '@/components/ProgressBar';
import { useApp } from '@/contexts/AppContext';

export default function JobDescriptionPage() {
  const router = useRouter();
  const { state, dispatch } = useApp();

  const [description, setDescription] = useState(state.jobDescription);
  const [error, setError] = useState<string | null>(null);

  // the context is restored from sessionStorage after the first render
  useEffect(() => {
    if (state.jobDescription) setDescription((d) => d || state.jobDescription);
  }, [state.jobDescription]);

  function handleContinue() {
    setError(null);
    if (!description.trim()) {
      setError('Please provide a job description');
      return;
    }

    // stored as typed; the server embeds it verbatim
    dispatch({ type: 'SET_JOB_DESCRIPTION', payload: description });
    router.push('/resume-upload');
  }

  return (
    <main className="max-w-4xl mx-auto px-4 py-8">
      <ProgressBar currentStep={1} />

      <h1 className="text-4xl font-bold bg-gradient-to-r from-violet-600 to-fuchsia-600 bg-clip-text text-transparent mb-2">
        AI Resume Analyzer
      </h1>
      <p className="text-gray-600 mb-6">
        Paste the job description. Your résumé will be scored against this text.
      </p>

      <div className="bg-white rounded-2xl shadow p-6">
        <label htmlFor="jd" className="block text-sm font-semibold text-gray-700 mb-1">
          Job Description *
        </label>
        <textarea
          id="jd"
          value={description}
          onChange={(e) => setDescription(e.target.value)}
          rows={12}
          placeholder="Paste the full job description here (responsibilities, skills, must-haves...)."
          className="w-full rounded-lg border border-gray-300 p-3 focus:border-violet-500 focus:ring-violet-500"
        />
      </div>

      {error && <div className="mt-4 text-red-600">{error}</div>}

      <div className="mt-6 flex items-center gap-3">
        <button
          onClick={handleContinue}
          className="px-5 py-2.5 rounded-lg bg-violet-600 text-white hover:bg-violet-700 transition-colors"
        >
          Continue
        </button>
      </div>
    </main>
  );
}
