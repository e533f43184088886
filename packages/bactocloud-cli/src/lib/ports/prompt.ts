/**
 * Interactive input. Only used when no API key comes from a flag, the
 * environment or the credential store.
 */
export interface PromptService {
  /** Read a masked value; undefined when the user enters nothing or aborts */
  secret(message: string): Promise<string | undefined>;
}
