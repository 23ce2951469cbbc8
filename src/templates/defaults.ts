/**
 * Built-in default templates
 * These are used when no user template is provided
 */

import type { MarkdownConfig } from "../types";

/**
 * Generate default file template
 * Front matter (when enabled) followed by the rendered document body
 */
export function getDefaultFileTemplate(config: MarkdownConfig): string {
  if (!config.frontMatter) {
    return "{{{content}}}\n";
  }

  return `---
title: {{{yaml title}}}
source: {{{yaml source}}}
converted_at: {{{convertedAt}}}
quality_score: {{qualityScore}}
---

{{{content}}}
`;
}
