export type SerpOrganicResult = {
  link: string;
  title?: string;
  snippet?: string;
};

export type SerpKnowledgeGraph = {
  title?: string;
  type?: string;
  description?: string;
};

export type SerpSearchResult = {
  organic: SerpOrganicResult[];
  knowledgeGraph?: SerpKnowledgeGraph;
};

export interface SerpProvider {
  search(query: string): Promise<SerpSearchResult>;
}
