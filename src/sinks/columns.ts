import type { JobListing } from '../types.js';

export const EXPORT_HEADER = [
  'Date',
  'Titre',
  'Entreprise',
  'Localisation',
  'Description',
  "Lien vers l'offre",
  'Type de contrat',
  'Lien vers la lettre de motivation',
];

const EXCERPT_LENGTH = 200;

export function isoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function excerpt(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > EXCERPT_LENGTH ? `${flat.slice(0, EXCERPT_LENGTH - 1)}…` : flat;
}

export function toRow(listing: JobListing, letterPath = ''): string[] {
  return [
    isoDate(listing.discoveredAt),
    listing.title,
    listing.company,
    listing.location,
    excerpt(listing.description),
    listing.url,
    listing.contractType,
    letterPath,
  ];
}

export function toRows(records: readonly JobListing[], letterPaths: ReadonlyMap<string, string>): string[][] {
  return records.map((listing) => toRow(listing, letterPaths.get(listing.url)));
}
