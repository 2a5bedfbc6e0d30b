import { z } from 'zod';
import { defineRule } from '../types.js';

const URL = /\bhttps?:\/\/\S+/;

export const lineLength = defineRule({
  meta: {
    id: 'structure/line-length',
    title: 'Lines fit within the column limit',
    category: 'structure',
    severity: 'warning',
    fixable: false,
    enabledByDefault: true,
  },
  parameters: z
    .object({
      /** Column limit; defaults to the global lineLength */
      max: z.number().int().positive().optional(),
      /** Skip lines containing a URL */
      ignoreUrls: z.boolean().default(true),
      /** Skip import declarations */
      ignoreImports: z.boolean().default(true),
    })
    .strict(),
  create(context) {
    const { source, params, options } = context;
    const max = params.max ?? options.lineLength;
    return {
      file() {
        for (let line = 1; line <= source.lines.lineCount; line++) {
          const text = source.lines.lineText(line);
          if (text.length <= max) continue;
          if (params.ignoreImports && /^\s*import\s/.test(text)) continue;
          if (params.ignoreUrls && URL.test(text)) continue;

          const lineStart = source.lines.lineStart(line);
          context.report({
            startOffset: lineStart + max,
            endOffset: lineStart + text.length,
            message: `Line is ${text.length} characters long; the limit is ${max}`,
          });
        }
      },
    };
  },
});
