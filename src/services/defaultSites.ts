import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { SITE_STYLES, NewSite } from '../types';

export const DEFAULT_SITES_PATH = path.join(__dirname, '../../data/default-sites.json');

const defaultSitesSchema = z.array(
    z.object({
        url: z.string().url(),
        intervalSecs: z.number().int().optional(),
        style: z.enum(SITE_STYLES).optional(),
    })
);

export function loadDefaultSites(file: string = DEFAULT_SITES_PATH): NewSite[] {
    const raw = fs.readFileSync(file, 'utf8');
    const parsed = defaultSitesSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
        const errs = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new Error(`Invalid default sites file ${file}: ${errs}`);
    }
    return parsed.data;
}
