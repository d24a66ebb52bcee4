export type PromptTemplate = {
  description: string;
  variables: string[];
  template: string;
};

export type PromptTemplates = Record<string, PromptTemplate>;

export const PROMPT_NAMES = {
  timeRange: "time_range_extraction",
  industryKeywords: "industry_keyword_extraction",
  reportTypes: "report_type_recommendation",
  ragAnalysis: "rag_analysis"
} as const;

/** Appended to the analysis prompt when broker opinions are to be left out. */
export const EXCLUDE_OPINIONS_INSTRUCTION =
  "\nUse facts only: leave out the opinions, recommendations, investment ratings and target prices " +
  "that broker report authors give, and say that you left them out.";

export const DEFAULT_PROMPTS: PromptTemplates = {
  time_range_extraction: {
    description: "How many years of filings the question needs",
    variables: ["user_query"],
    template: `Decide how many years of company filings are needed to answer the question below.

Question: {user_query}

Rules
- "recent" or no period mentioned: 3 years.
- An explicit period ("last 5 years", "since 2019"): cover it.
- Long-term trend questions: 5 to 10 years.

Reply with JSON only: {"years": <integer 1-10>, "reason": "<one sentence>"}`
  },
  industry_keyword_extraction: {
    description: "Industry keywords for finding industry research reports",
    variables: ["user_query", "company_name", "base_industry"],
    template: `Company: {company_name}
Registered industry: {base_industry}
Question: {user_query}

List 1 to 3 short industry keywords (for example "semiconductor", "secondary battery")
that an industry research report relevant to this question would be filed under.
Prefer the wording used by Korean brokerage research.

Reply with JSON only: {"keywords": ["...", "..."]}`
  },
  report_type_recommendation: {
    description: "Which kinds of regulatory filing the question needs",
    variables: ["user_query"],
    template: `Choose the filing types needed to answer the question below.

Question: {user_query}

Types
- "annual": business report with full-year financials and business overview.
- "half-year": semi-annual report.
- "quarterly": quarterly report, for recent results.
- "material-event": material event reports (mergers, capital changes, large contracts).
- "audit": external audit reports.

Reply with JSON only:
{"recommended_types": ["..."], "reason": "<one sentence>", "need_historical_reports": <true|false>}`
  },
  rag_analysis: {
    description: "Answer a question from retrieved report passages",
    variables: ["company_name", "user_query", "num_chunks", "context", "exclude_opinions_instruction"],
    template: `Company: {company_name}
Question: {user_query}

Below are {num_chunks} passages retrieved from filings and research reports.
Answer the question using only these passages. Cite the report name and date for
each figure. If the passages do not answer the question, say what is missing.{exclude_opinions_instruction}

{context}`
  }
};
