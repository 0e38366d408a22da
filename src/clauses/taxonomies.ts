import type { Taxonomy } from '../types.js';

export const COMMERCIAL_CLAUSES: Taxonomy = Object.freeze({
  'Payment Terms': Object.freeze(['payment terms', 'terms of payment', 'payment schedule']),
  IP: Object.freeze(['intellectual property', 'IP rights', 'ownership of work']),
  'Delivery Terms': Object.freeze(['delivery terms', 'delivery schedule', 'shipment terms']),
  'Warranties and Representations': Object.freeze(['warranties', 'representations', 'guarantees']),
});

export const LEGAL_CLAUSES: Taxonomy = Object.freeze({
  Indemnification: Object.freeze(['indemnification', 'hold harmless']),
  Termination: Object.freeze(['termination', 'end of agreement', 'contract termination']),
  Confidentiality: Object.freeze(['confidentiality', 'non-disclosure', 'nda']),
  'Limitation of Liability': Object.freeze(['limitation of liability', 'liability cap', 'liability limit']),
});

export const TAXONOMIES = {
  commercial: COMMERCIAL_CLAUSES,
  legal: LEGAL_CLAUSES,
} as const;

export type TaxonomyName = keyof typeof TAXONOMIES;
