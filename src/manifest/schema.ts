import { z } from 'zod';

// YAML leaves `goal:` with no value as null; treat it like an omitted key
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const jobEntrySchema = z.object({
  date: z.string(),
  title: z.string(),
  company: z.string(),
  goal: optionalText,
  value: optionalText,
  contributions: z.array(z.string()),
});

export const techEntrySchema = z.object({
  label: z.string(),
  details: z.string(),
  hanging_indent: z.boolean().optional(),
});

export const educationSchema = z.object({
  degree: z.string(),
  institution: z.string(),
  major: z.string(),
  specialization: z.string(),
});

export const manifestSchema = z.object({
  name: z.string(),
  contact_lines: z.array(z.string()),
  education: educationSchema,
  experience: z.array(jobEntrySchema),
  technical_experience: z.array(techEntrySchema),
});

export type JobEntry = z.infer<typeof jobEntrySchema>;
export type TechEntry = z.infer<typeof techEntrySchema>;
export type Education = z.infer<typeof educationSchema>;
export type Manifest = z.infer<typeof manifestSchema>;
