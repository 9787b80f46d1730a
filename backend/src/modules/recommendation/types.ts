export type RecommendationEntry = {
  product_id: number;
  title: string;
  similarity: number;
};

export type RecommendationResult = {
  product_id: number;
  title: string;
  recommendations: RecommendationEntry[];
};
