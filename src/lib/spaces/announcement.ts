import { z } from "zod";
import type { SpaceDescriptor } from "@/types";

export const spaceDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  number: z.number().int(),
});

export const currentSpaceAnnouncementSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  number: z.number().int().optional(),
});

export type CurrentSpaceAnnouncement = z.infer<typeof currentSpaceAnnouncementSchema>;

/**
 * Normalizes a space list payload. Entries that do not carry an id, a name and
 * an integer number are dropped; the rest are ordered by number.
 */
export function normalizeSpaceList(raw: unknown): SpaceDescriptor[] {
  if (!Array.isArray(raw)) return [];

  const spaces: SpaceDescriptor[] = [];
  const seen = new Set<string>();
  for (const entry of raw) {
    const parsed = spaceDescriptorSchema.safeParse(entry);
    if (!parsed.success || seen.has(parsed.data.id)) continue;
    seen.add(parsed.data.id);
    spaces.push(parsed.data);
  }

  return spaces.sort((a, b) => a.number - b.number);
}

export function parseCurrentSpaceAnnouncement(raw: unknown): CurrentSpaceAnnouncement | null {
  if (typeof raw === "string") {
    return raw.length > 0 ? { id: raw } : null;
  }
  const parsed = currentSpaceAnnouncementSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
