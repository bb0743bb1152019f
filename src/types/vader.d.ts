declare module "vader-sentiment" {
  export class SentimentIntensityAnalyzer {
    static polarity_scores(text: string): { compound: number };
  }
}
