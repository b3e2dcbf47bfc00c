import type {
  LLMAdapter,
  AnalyzeJobPostingInput,
  AnalyzeJobPostingOutput,
  GenerateRecommendationsInput,
  GenerateRecommendationsOutput,
  CollaboratorJobAnalysis,
} from "../../core/llm/adapter"

type Behaviour<I, O> = (input: I) => Promise<O>

/** In-process collaborator double; records every call it receives. */
export class FakeLLM implements LLMAdapter {
  analyzeCalls: AnalyzeJobPostingInput[] = []
  recommendationCalls: GenerateRecommendationsInput[] = []

  constructor(
    private analyze: Behaviour<AnalyzeJobPostingInput, AnalyzeJobPostingOutput>,
    private recommend: Behaviour<GenerateRecommendationsInput, GenerateRecommendationsOutput>
  ) {}

  analyzeJobPosting(input: AnalyzeJobPostingInput) {
    this.analyzeCalls.push(input)
    return this.analyze(input)
  }

  generateRecommendations(input: GenerateRecommendationsInput) {
    this.recommendationCalls.push(input)
    return this.recommend(input)
  }
}

export function failingLLM(message = "OPENAI_ERROR_503: upstream unavailable"): FakeLLM {
  return new FakeLLM(
    async () => {
      throw new Error(message)
    },
    async () => {
      throw new Error(message)
    }
  )
}

export function hangingLLM(): FakeLLM {
  return new FakeLLM(
    () => new Promise<AnalyzeJobPostingOutput>(() => {}),
    () => new Promise<GenerateRecommendationsOutput>(() => {})
  )
}

export function collaboratorAnalysis(overrides: Partial<CollaboratorJobAnalysis> = {}): CollaboratorJobAnalysis {
  return {
    required_skills: [],
    preferred_skills: [],
    hard_requirements: [],
    soft_requirements: [],
    responsibilities: [],
    keywords: [],
    experience_level: "unknown",
    education_requirements: [],
    industry: "general",
    ...overrides,
  }
}

export function scriptedLLM(analysis: CollaboratorJobAnalysis, recommendations: string[]): FakeLLM {
  return new FakeLLM(
    async () => ({ analysis, modelUsed: "gpt-4o-mini", latencyMs: 5 }),
    async () => ({ recommendations, modelUsed: "gpt-4o-mini", latencyMs: 5 })
  )
}
