import { z } from 'zod';

export const REQUIRED_AGENT_FIELDS = [
  'Name',
  'Looks',
  'Anomaly_Contact',
  'Agency_Contact',
  'Power_Visual',
  'Annual_Salary',
  'Coffee',
  'Collaboration',
  'Work_Experience',
  'Primary_Contact',
  'First_Connection',
  'Second_Connection',
  'Third_Connection'
] as const;

export const OPTIONAL_AGENT_FIELDS = ['Anomaly', 'Reality', 'Competency'] as const;

export type RequiredAgentField = (typeof REQUIRED_AGENT_FIELDS)[number];
export type OptionalAgentField = (typeof OPTIONAL_AGENT_FIELDS)[number];
export type AgentField = RequiredAgentField | OptionalAgentField;

// Values stay verbatim; a whitespace-only value still counts as blank.
const RequiredText = z.string().refine((value) => value.trim().length > 0, { message: 'blank' });
const OptionalText = z
  .string()
  .optional()
  .transform((value) => (value !== undefined && value.trim().length > 0 ? value : undefined));

export const AgentRecordSchema = z.object({
  Name: RequiredText,
  Looks: RequiredText,
  Anomaly_Contact: RequiredText,
  Agency_Contact: RequiredText,
  Power_Visual: RequiredText,
  Annual_Salary: RequiredText,
  Coffee: RequiredText,
  Collaboration: RequiredText,
  Work_Experience: RequiredText,
  Primary_Contact: RequiredText,
  First_Connection: RequiredText,
  Second_Connection: RequiredText,
  Third_Connection: RequiredText,
  Anomaly: OptionalText,
  Reality: OptionalText,
  Competency: OptionalText
});

export type AgentRecord = z.infer<typeof AgentRecordSchema>;

/** One row exactly as read from the roster: header text to cell text. */
export type RawAgentRow = Record<string, string>;

export type AgentRecordValidation =
  | { ok: true; record: AgentRecord }
  | { ok: false; missingFields: RequiredAgentField[] };

const isRequiredField = (value: unknown): value is RequiredAgentField =>
  typeof value === 'string' && (REQUIRED_AGENT_FIELDS as readonly string[]).includes(value);

export const validateAgentRow = (row: RawAgentRow): AgentRecordValidation => {
  const parsed = AgentRecordSchema.safeParse(row);
  if (parsed.success) {
    return { ok: true, record: parsed.data };
  }

  const missing = new Set<RequiredAgentField>();
  for (const issue of parsed.error.issues) {
    const field = issue.path[0];
    if (isRequiredField(field)) {
      missing.add(field);
    }
  }

  return {
    ok: false,
    missingFields: REQUIRED_AGENT_FIELDS.filter((field) => missing.has(field))
  };
};
