/**
 * Review Place Import Prompt
 * Guides a reviewer through a converted municipality before it goes into OSM
 */

import { z } from 'zod';
import type { GetPromptResult } from '@modelcontextprotocol/sdk/types.js';

export const REVIEW_PLACE_IMPORT_PROMPT_NAME = 'review_place_import';
export const REVIEW_PLACE_IMPORT_PROMPT_DESCRIPTION =
  'Convert a municipality and review duplicates, ambiguous names and relocated points before importing to OpenStreetMap';

/**
 * Prompt arguments (prompt arguments are always strings)
 */
export const ReviewPlaceImportArgsShape = {
  municipality: z.string().min(1).describe('Municipality name or 4-digit code (e.g. "Ringsaker" or "3411")'),
  nameType: z.string().optional().describe('Limit the review to one SSR name type (e.g. "vik")'),
  previousFile: z
    .string()
    .optional()
    .describe('Path to an earlier conversion of the same municipality to compare names against'),
};

export const ReviewPlaceImportArgsSchema = z.object(ReviewPlaceImportArgsShape);

export type ReviewPlaceImportArgs = z.infer<typeof ReviewPlaceImportArgsSchema>;

export function getReviewPlaceImportPrompt(args: ReviewPlaceImportArgs): GetPromptResult {
  const { municipality, nameType, previousFile } = args;

  const typeArgument = nameType ? `\n   - nameType: "${nameType}"` : '';
  const diffStep = previousFile
    ? `
4. Call ssr_diff_names with firstPath "${previousFile}" and secondPath set to the new file.
   Summarise names that changed, and places that appeared or disappeared since the earlier conversion.
`
    : '';

  const promptMessage = `You are reviewing an import of Norwegian place names from Kartverket's central place name register (SSR) into OpenStreetMap.

**Import Details:**
- Municipality: ${municipality}${nameType ? `\n- Name type: ${nameType}` : ''}

**Your Task:**
1. Call ssr_lookup_scope with scope "${municipality}" and confirm it resolves to a single municipality.

2. Call ssr_convert_places with:
   - scope: "${municipality}"${typeArgument}
   - includeUntagged: false

3. From the structured result, review:
   - Duplicate names: places that kept a name shared with a nearby place of another type
   - Ambiguous names (AMBIGUOUS_NAME issues): several preferred spellings in one language, written as "a;b" in name
   - Relocated points: places moved out of building footprints
   - Rank adjustments: settlements whose place=* was changed to match N50/N100 map data
   - Names in other languages than Norwegian (name:se, name:fkv, name:smj, name:sma)
${diffStep}
**Report:**
- Start with the output file path and the number of places converted
- List issues that need a human decision before upload, grouped by kind
- End with a short go/no-go recommendation for the import

**Important:**
- Always credit the data: "Inneholder data under CC BY 4.0 fra Kartverket (Sentralt stedsnavnregister)"
- Never upload anything yourself; the reviewer decides

Begin by calling the tools now.`;

  return {
    messages: [
      {
        role: 'user',
        content: {
          type: 'text',
          text: promptMessage,
        },
      },
    ],
  };
}
