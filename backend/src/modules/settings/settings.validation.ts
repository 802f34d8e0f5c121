import { z } from "zod";

export const AutoquizIntervalSchema = z.coerce.number().int().min(1).max(1440);

export const FooterTextSchema = z.string().trim().min(1).max(200);
