import { z } from 'zod';

export const ConfigSchema = z
  .strictObject({
    query: z
      .string({ error: 'query is required' })
      .describe('Text searched for as a contiguous substring of each line'),
    filePath: z
      .string({ error: 'file_path is required' })
      .describe('Path of the UTF-8 text file to search'),
    caseInsensitive: z
      .boolean()
      .describe('Fold query and lines to lowercase before comparing'),
  })
  .readonly();
