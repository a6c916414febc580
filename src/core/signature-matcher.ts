import type { WatermarkSignatures } from '../types/config.js';
import { DEFAULT_SIGNATURES } from '../config.js';

export class SignatureMatcher {
  private readonly keywords: readonly string[];
  private readonly domains: readonly string[];

  constructor(signatures: WatermarkSignatures = DEFAULT_SIGNATURES) {
    this.keywords = normalize(signatures.keywords);
    this.domains = normalize(signatures.domains);
  }

  matchesWatermarkText(text: string | null | undefined): boolean {
    return containsAny(text, this.keywords);
  }

  matchesWatermarkUrl(url: string | null | undefined): boolean {
    return containsAny(url, this.domains);
  }
}

function normalize(values: readonly string[]): readonly string[] {
  return values.map((v) => v.toLowerCase()).filter((v) => v.length > 0);
}

function containsAny(value: string | null | undefined, needles: readonly string[]): boolean {
  if (!value) return false;
  const haystack = value.toLowerCase();
  return needles.some((needle) => haystack.includes(needle));
}
