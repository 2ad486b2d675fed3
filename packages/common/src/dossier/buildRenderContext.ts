/**
 * buildRenderContext — turns a validated agent record and its photo into the flat
 * DossierRenderContext used for template substitution.
 *
 * This is the only place where optional-field fallbacks, photo markup, escaping and the
 * generation timestamp are decided. Templates receive final strings.
 */

import type { AgentRecord } from '@dossier/contracts';
import {
    OPTIONAL_FIELD_PLACEHOLDERS,
    PHOTO_HEIGHT,
    PHOTO_PENDING_MARKUP,
    PHOTO_WIDTH,
    type DossierPhoto,
    type DossierRenderContext
} from './renderContext.js';

export interface BuildRenderContextOptions {
    escapeHtml?: boolean;
    now?: Date;
}

// ──────────────────────────────── Helpers ─────────────────────────────────────

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#039;');
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${day} ${time}`;
}

export function buildPhotoMarkup(photo: DossierPhoto): string {
    if (photo.status === 'missing') return PHOTO_PENDING_MARKUP;
    return `<img src="${photo.dataUri}" alt="Agent Photo" style="width: ${PHOTO_WIDTH}px; height: ${PHOTO_HEIGHT}px; object-fit: cover;">`;
}

// ──────────────────────────────── Builder ─────────────────────────────────────

export function buildRenderContext(
    record: AgentRecord,
    photo: DossierPhoto,
    options: BuildRenderContextOptions = {}
): DossierRenderContext {
    const text = options.escapeHtml ? escapeHtml : (value: string) => value;
    const now = options.now ?? new Date();

    return {
        name: text(record.Name),
        looks: text(record.Looks),
        photo: buildPhotoMarkup(photo),
        photo_uri: photo.status === 'found' ? photo.dataUri : '',
        anomaly: record.Anomaly !== undefined ? text(record.Anomaly) : OPTIONAL_FIELD_PLACEHOLDERS.anomaly,
        reality: record.Reality !== undefined ? text(record.Reality) : OPTIONAL_FIELD_PLACEHOLDERS.reality,
        competency:
            record.Competency !== undefined ? text(record.Competency) : OPTIONAL_FIELD_PLACEHOLDERS.competency,
        anomaly_contact: text(record.Anomaly_Contact),
        agency_contact: text(record.Agency_Contact),
        power_visual: text(record.Power_Visual),
        annual_salary: text(record.Annual_Salary),
        coffee: text(record.Coffee),
        collaboration: text(record.Collaboration),
        work_experience: text(record.Work_Experience),
        primary_contact: text(record.Primary_Contact),
        first_connection: text(record.First_Connection),
        second_connection: text(record.Second_Connection),
        third_connection: text(record.Third_Connection),
        timestamp: formatTimestamp(now)
    };
}
