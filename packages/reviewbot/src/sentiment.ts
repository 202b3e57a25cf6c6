import vader from 'vader-sentiment';

/** Scores text from -1 (most negative) to 1 (most positive). */
export interface SentimentScorer {
  compound(text: string): number;
}

export const vaderScorer: SentimentScorer = {
  compound: (text) => vader.SentimentIntensityAnalyzer.polarity_scores(text).compound,
};
