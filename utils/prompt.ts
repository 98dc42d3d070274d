// utils/prompt.ts

/**
 * Prompt sent to Gemini for one résumé/job-description pair. Both inputs are
 * embedded verbatim; the JSON example below is the only thing steering the
 * shape of the reply (it is checked later, in parseAnalysis).
 */
export function buildPrompt(resumeText: string, jobDescription: string): string {
  return `You are an expert ATS (Applicant Tracking System) analyzer and career consultant.
Analyze the following resume against the job description and provide a comprehensive analysis.

RESUME CONTENT:
${resumeText}

JOB DESCRIPTION:
${jobDescription}

Provide your analysis in the following JSON format (respond ONLY with valid JSON, no markdown, no extra text):

{
  "atsScore": <integer between 0-100>,
  "summary": "<2-3 sentence summary of the candidate's fit for the role>",
  "categoryScores": {
    "hardSkills": <score 0-5>,
    "softSkills": <score 0-5>,
    "experience": <score 0-5>,
    "qualifications": <score 0-5>
  },
  "strengths": [
    "<strength 1>",
    "<strength 2>",
    "<strength 3>"
  ],
  "weaknesses": [
    "<weakness 1>",
    "<weakness 2>",
    "<weakness 3>"
  ],
  "recommendations": [
    "<actionable recommendation 1>",
    "<actionable recommendation 2>",
    "<actionable recommendation 3>"
  ]
}

ANALYSIS CRITERIA:
- ATS Score: Overall match percentage (0-100)
- Hard Skills: Technical skills match (0-5)
- Soft Skills: Communication, leadership, teamwork (0-5)
- Experience: Relevant work experience (0-5)
- Qualifications: Education and certifications (0-5)
- Strengths: Exactly 3 positive highlights
- Weaknesses: Exactly 3 areas for improvement
- Recommendations: Exactly 3 actionable suggestions to improve the resume

Be honest, constructive, and specific in your analysis.
`;
}
