// src/services/prompts.ts

const ANALYSIS_SCHEMA = `{
  "name": "Full name of the person",
  "contact_details": {
    "email": "Email address",
    "phone": "Phone number",
    "location": "City, State/Country"
  },
  "education": {
    "university": "University/Institution name",
    "year_of_study": "Current year or graduation year",
    "course": "Degree program name",
    "discipline": "Field of study",
    "cgpa_percentage": "CGPA or percentage if available"
  },
  "skills": {
    "technical_skills": ["List of technical skills"],
    "soft_skills": ["List of soft skills"],
    "programming_languages": ["List of programming languages"],
    "tools_technologies": ["List of tools and technologies"]
  },
  "experience_scores": {
    "ai_ml_experience": 1,
    "gen_ai_experience": 1,
    "overall_experience": 1
  },
  "supporting_information": {
    "certifications": ["List of relevant certifications"],
    "internships": ["List of internships"],
    "projects": ["List of relevant projects"],
    "achievements": ["List of achievements"]
  },
  "analysis_metadata": {
    "processing_timestamp": "Current timestamp",
    "file_name": "Original file name",
    "confidence_score": 1
  }
}`;

export function buildAnalysisPrompt(resumeText: string): string {
  return `
Analyze the following resume and extract the information below. Respond with JSON only, no additional text or markdown formatting.

Return a JSON object with this exact structure:

${ANALYSIS_SCHEMA}

Scoring rules:
- "ai_ml_experience": integer from 1 to 10 based on AI/ML experience
- "gen_ai_experience": integer from 1 to 10 based on Generative AI experience
- "overall_experience": integer from 1 to 10 based on overall experience
- "confidence_score": integer from 1 to 10 for your confidence in this analysis
Use an empty string or empty list when information is not present.

**RESUME TEXT:**
${resumeText}
`.trim();
}

export const SAMPLE_QUESTIONS = [
  "Which candidates have the highest AI/ML experience scores?",
  "Who has experience with Python and machine learning?",
  "Which universities are most represented in the resumes?",
  "Who has certifications in AI or data science?",
  "Which candidates have internship experience?",
  "What are the most common technical skills among the candidates?",
  "Who has the highest overall experience score?",
  "Which candidates have projects related to AI or ML?",
];

export function buildChatPrompt(question: string, context?: string): string {
  if (context) {
    return `
Based on the following resume analysis results, answer the user's question.

${context}

User Question: ${question}

Please provide a detailed and helpful answer based on the resume analysis data.
If the data doesn't contain relevant information, please mention that.
`.trim();
  }

  return `
User Question: ${question}

Note: No resume analysis data is currently available.
Please provide a general response about what kind of insights could be obtained from resume analysis.
`.trim();
}
