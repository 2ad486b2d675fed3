/**
 * DossierRenderContext — every value a dossier template can ask for.
 *
 * Keys are the placeholder names: `{name}` in the template reads `name` here.
 * Single braces, lower-cased field names.
 */

export const DOSSIER_PLACEHOLDERS = [
  'name',
  'looks',
  'photo',
  'photo_uri',
  'anomaly',
  'reality',
  'competency',
  'anomaly_contact',
  'agency_contact',
  'power_visual',
  'annual_salary',
  'coffee',
  'collaboration',
  'work_experience',
  'primary_contact',
  'first_connection',
  'second_connection',
  'third_connection',
  'timestamp'
] as const;

export type DossierPlaceholder = (typeof DOSSIER_PLACEHOLDERS)[number];

export type DossierRenderContext = Record<DossierPlaceholder, string>;

export const isDossierPlaceholder = (value: string): value is DossierPlaceholder =>
  (DOSSIER_PLACEHOLDERS as readonly string[]).includes(value);

// ──────────────────────────────────── Photo ───────────────────────────────────

export type DossierPhoto = { status: 'found'; dataUri: string } | { status: 'missing' };

export const PHOTO_WIDTH = 150;
export const PHOTO_HEIGHT = 200;

export const PHOTO_PENDING_MARKUP = 'PHOTO<br>[PENDING]';

// ──────────────────────────────────── Fallbacks ───────────────────────────────

export const OPTIONAL_FIELD_PLACEHOLDERS = {
  anomaly: '[ANOMALY TYPE]',
  reality: '[REALITY LEVEL]',
  competency: '[COMPETENCY LEVEL]'
} as const;
