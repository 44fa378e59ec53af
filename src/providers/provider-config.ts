export interface OllamaProviderConfig {
  host?: string;
}

export interface AiSdkProviderConfig {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
}
