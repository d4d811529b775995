import type { GenerateOptions, TextGenerator } from "./types.js";

/**
 * Affirmative verdict accepted by every workflow contract: each stage's
 * schema reads its own field and ignores the rest.
 */
export const FIXTURE_VERDICT = {
  complete: true,
  correct: true,
  confirmed: false,
  accepted: true,
  reason: "fixture response",
} as const;

/**
 * Deterministic offline generator
 *
 * Lets the whole workflow run without credentials; every record passes
 * every check and no redundancy is confirmed.
 */
export class FixturesGenerator implements TextGenerator {
  readonly name = "fixtures";
  readonly model = "fixture-v1";

  async generate(_prompt: string, _options: GenerateOptions): Promise<string> {
    return JSON.stringify(FIXTURE_VERDICT);
  }
}
