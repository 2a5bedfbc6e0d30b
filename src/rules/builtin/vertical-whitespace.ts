import { z } from 'zod';
import { defineRule } from '../types.js';

export const verticalWhitespace = defineRule({
  meta: {
    id: 'spacing/vertical-whitespace',
    title: 'No runs of more than one blank line',
    category: 'spacing',
    severity: 'error',
    fixable: true,
    enabledByDefault: true,
  },
  parameters: z
    .object({
      /** Blank lines allowed in a row */
      maxEmptyLines: z.number().int().nonnegative().default(1),
    })
    .strict(),
  create(context) {
    const { source, params } = context;
    const { tokens } = source;
    return {
      file() {
        let i = 0;
        while (i < tokens.length) {
          if (tokens[i].kind !== 'newline') {
            i++;
            continue;
          }

          const run = [i];
          let j = i + 1;
          while (j < tokens.length && (tokens[j].kind === 'whitespace' || tokens[j].kind === 'newline')) {
            if (tokens[j].kind === 'newline') run.push(j);
            j++;
          }

          // at the start of the file every newline ends a blank line
          const leading = i === 0 || (i === 1 && tokens[0].kind === 'whitespace');
          const empty = leading ? run.length : run.length - 1;
          // blank lines at the end of the file belong to structure/final-newline
          if (j < tokens.length && empty > params.maxEmptyLines) {
            const kept = leading ? params.maxEmptyLines - 1 : params.maxEmptyLines;
            const startOffset = kept < 0 ? 0 : tokens[run[kept]].end;
            const endOffset = tokens[run[run.length - 1]].end;
            context.report({
              startOffset,
              endOffset,
              message: `Too many blank lines (${empty}, at most ${params.maxEmptyLines} allowed)`,
              fix: [{ startOffset, endOffset, text: '' }],
            });
          }
          i = j;
        }
      },
    };
  },
});
