// contexts/AppContext.tsx
"use client";

import React, { createContext, useContext, useEffect, useReducer } from "react";
import type { AnalysisResult, UploadedFile } from "@/types";
import { AnalysisSchema } from "@/utils/analysisSchema";

type State = {
  jobDescription: string;
  uploadedFile: UploadedFile | null;
  analysisResult: AnalysisResult | null;
  loading: boolean;
};

export type Action =
  | { type: "SET_JOB_DESCRIPTION"; payload: string }
  | { type: "SET_UPLOADED_FILE"; payload: UploadedFile | null }
  | { type: "SET_ANALYSIS_RESULT"; payload: AnalysisResult | null }
  | { type: "SET_LOADING"; payload: boolean }
  | { type: "RESET" };

export const initialState: State = {
  jobDescription: "",
  uploadedFile: null,
  analysisResult: null,
  loading: false,
};

const JD_KEY = "jobDescription";
const RESULT_KEY = "analysisResult";

const AppContext = createContext<{
  state: State;
  dispatch: React.Dispatch<Action>;
} | null>(null);

export function reducer(state: State, action: Action): State {
  switch (action.type) {
    case "SET_JOB_DESCRIPTION":
      return { ...state, jobDescription: action.payload };
    case "SET_UPLOADED_FILE":
      // a new résumé invalidates the previous result
      return { ...state, uploadedFile: action.payload, analysisResult: null };
    case "SET_ANALYSIS_RESULT":
      return { ...state, analysisResult: action.payload };
    case "SET_LOADING":
      return { ...state, loading: action.payload };
    case "RESET":
      return initialState;
    default:
      return state;
  }
}

/** Writes (or, for null, removes) one sessionStorage entry; storage errors are only logged. */
export function persist(key: string, value: string | null) {
  try {
    if (value === null) sessionStorage.removeItem(key);
    else sessionStorage.setItem(key, value);
  } catch (e) {
    console.warn("Could not save session state:", e);
  }
}

export function AppProvider({ children }: { children: React.ReactNode }) {
  const [state, dispatch] = useReducer(reducer, initialState);

  // Hydrate from sessionStorage on first client mount. The File itself is
  // not serializable, so only the text and the last result survive a reload.
  useEffect(() => {
    try {
      const jd = sessionStorage.getItem(JD_KEY);
      if (jd) dispatch({ type: "SET_JOB_DESCRIPTION", payload: jd });

      const rawResult = sessionStorage.getItem(RESULT_KEY);
      if (rawResult) {
        const parsed = AnalysisSchema.safeParse(JSON.parse(rawResult));
        if (parsed.success) dispatch({ type: "SET_ANALYSIS_RESULT", payload: parsed.data });
      }
    } catch (e) {
      console.warn("Could not restore session state:", e);
    }
  }, []);

  useEffect(() => {
    persist(JD_KEY, state.jobDescription);
  }, [state.jobDescription]);

  useEffect(() => {
    persist(RESULT_KEY, state.analysisResult ? JSON.stringify(state.analysisResult) : null);
  }, [state.analysisResult]);

  return (
    <AppContext.Provider value={{ state, dispatch }}>
      {children}
    </AppContext.Provider>
  );
}

export function useApp() {
  const ctx = useContext(AppContext);
  if (!ctx) throw new Error("useApp must be used inside AppProvider");
  return ctx;
}
