import type { JobEntry, Manifest } from '../../manifest/schema.js';

export function makeJob(overrides: Partial<JobEntry> = {}): JobEntry {
  return {
    date: '2020 - 2021',
    title: 'Engineer',
    company: 'Acme',
    contributions: ['Shipped the 2nd release'],
    ...overrides,
  };
}

export function makeManifest(overrides: Partial<Manifest> = {}): Manifest {
  return {
    name: 'Test Person',
    contact_lines: ['Site: www.example.com', 'test@example.com'],
    education: {
      degree: 'BSc',
      institution: 'Test University',
      major: 'Physics',
      specialization: 'Optics',
    },
    experience: [makeJob()],
    technical_experience: [{ label: 'Tools', details: 'Git' }],
    ...overrides,
  };
}
