export interface GenerateOptions {
  system?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Free-text generation; callers parse whatever comes back. */
export interface GenerativeTextProvider {
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}
