// core/domain/keywords.ts
import { TfIdf, WordTokenizer } from "natural";
import englishStopWords from "./data/english-stopwords.json";
import { clamp01, errorMessage, fail, succeed, type Outcome } from "./outcome";
import { dedupeCaseInsensitive } from "./text";

export type KeywordRelevance = {
  score: number;                 // tf-idf cosine similarity, 0..1
  keyword_density: number;       // literal matches / total keywords
  matching_keywords: string[];
  missing_keywords: string[];
};

const STOP = new Set<string>(englishStopWords);
const tokenizer = new WordTokenizer();

export function emptyKeywordRelevance(): KeywordRelevance {
  return { score: 0, keyword_density: 0, matching_keywords: [], missing_keywords: [] };
}

/** Unigrams plus adjacent-pair bigrams, English stop words removed first. */
export function ngramTerms(text: string): string[] {
  const unigrams = tokenizer
    .tokenize(String(text || "").toLowerCase())
    .filter((t) => t.length >= 2 && !STOP.has(t));

  const bigrams: string[] = [];
  for (let i = 0; i + 1 < unigrams.length; i++) {
    bigrams.push(`${unigrams[i]} ${unigrams[i + 1]}`);
  }
  return [...unigrams, ...bigrams];
}

/** Cosine similarity of the two documents' tf-idf vectors over a two-document corpus. */
export function tfidfCosine(a: string, b: string): Outcome<number> {
  try {
    const docA = ngramTerms(a);
    const docB = ngramTerms(b);
    if (!docA.length || !docB.length) {
      return fail("degenerate_vectorization", "EMPTY_VOCABULARY");
    }

    const tfidf = new TfIdf();
    tfidf.addDocument(docA);
    tfidf.addDocument(docB);

    // Terms are passed as one-element arrays: a bare string would be re-tokenized,
    // splitting every bigram back into its unigrams.
    const vocabulary = new Set([...docA, ...docB]);
    const vecA = new Map<string, number>();
    const vecB = new Map<string, number>();
    for (const term of vocabulary) {
      vecA.set(term, tfidf.tfidf([term], 0));
      vecB.set(term, tfidf.tfidf([term], 1));
    }

    let dot = 0;
    for (const term of vocabulary) dot += (vecA.get(term) ?? 0) * (vecB.get(term) ?? 0);

    const norm = (v: Map<string, number>) => Math.sqrt([...v.values()].reduce((s, w) => s + w * w, 0));
    const denom = norm(vecA) * norm(vecB);
    if (!Number.isFinite(denom) || denom === 0) {
      return fail("degenerate_vectorization", "ZERO_NORM_VECTOR");
    }

    return succeed(clamp01(dot / denom));
  } catch (e) {
    return fail("degenerate_vectorization", errorMessage(e));
  }
}

/**
 * Relevance of the resume text to the job keyword bag. An empty bag carries no
 * signal and scores 0; a degenerate vectorization scores 0 with empty lists.
 */
export function scoreKeywordRelevance(resumeText: string, keywords: readonly string[]): Outcome<KeywordRelevance> {
  const bag = dedupeCaseInsensitive(keywords);
  if (!bag.length) return succeed(emptyKeywordRelevance());

  const cosine = tfidfCosine(resumeText, bag.join(" "));
  if (!cosine.ok) return fail(cosine.kind, cosine.error);

  const haystack = String(resumeText || "").toLowerCase();
  const matching = bag.filter((k) => haystack.includes(k.toLowerCase()));
  const missing = bag.filter((k) => !haystack.includes(k.toLowerCase()));

  return succeed({
    score: cosine.value,
    keyword_density: matching.length / bag.length,
    matching_keywords: matching,
    missing_keywords: missing,
  });
}
