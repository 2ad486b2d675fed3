/**
 * Agent names become file names for both photo lookup and dossier output.
 *
 * Every character (code point, not UTF-16 unit) outside [A-Za-z0-9] maps to a single underscore, one for one, so
 * "Dr. Vex" and "Dr_ Vex" both become "Dr__Vex". The batch warns when two agents collide.
 */
export const sanitizeAgentName = (name: string): string => name.replace(/[^A-Za-z0-9]/gu, '_');

export const photoFileName = (name: string): string => `${sanitizeAgentName(name)}.jpg`;

export const dossierFileName = (name: string): string => `${sanitizeAgentName(name)}.html`;
