import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { DossierSetupError, errorMessage, type Logger } from '@dossier/common';

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL('../templates/dossier_template.html', import.meta.url));

// "▲" or "△" saved as UTF-8 and re-read as Windows-1252.
const TRIANGLE_MOJIBAKE_RE = /â–³|â–²/g;

export const repairTriangleGlyphs = (text: string): string => text.replace(TRIANGLE_MOJIBAKE_RE, '▲');

export const loadTemplate = async (templatePath: string, logger: Logger): Promise<string> => {
  let buffer: Buffer;
  try {
    buffer = await readFile(templatePath);
  } catch (error) {
    throw new DossierSetupError('TEMPLATE_UNREADABLE', `${templatePath}: ${errorMessage(error)}`);
  }

  let text: string;
  let encoding: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    encoding = 'utf-8';
  } catch {
    text = new TextDecoder('windows-1252').decode(buffer);
    encoding = 'windows-1252';
  }

  const repaired = repairTriangleGlyphs(text);

  logger.info('template_loaded', {
    path: templatePath,
    encoding,
    glyphs_repaired: repaired !== text,
    size_chars: repaired.length
  });

  return repaired;
};
