export type ChatRequest = {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
};

export interface ChatProvider {
  readonly name: string;
  complete(req: ChatRequest): Promise<string>;
}
