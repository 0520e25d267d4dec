import type { DocumentDefinition, PostProcess } from '../FieldSpec';
import { asCents, asDate, collapseWhitespace, toTitleCase } from '../postProcessors';
import { AMOUNT, DATE, LABEL_GAP, labelled } from './patterns';

const MIN_LIABILITY_DOLLARS = 1_000;
const FIRST_POLICY_YEAR = 2020;
const LAST_POLICY_YEAR = 2035;

const POLICY_FALSE_POSITIVES = new Set([
  'CERTIFICATE',
  'INSURANCE',
  'LIABILITY',
  'GENERAL',
  'COMMERCIAL',
  'POLICY',
  'COVERAGE',
  'EFFECTIVE',
  'EXPIRATION',
  'COMPANY',
  '1000000',
  '2000000',
  '500000',
  '750000',
  'IFICATE',
  'URANCE',
  'TIFICATE',
  'NUMBER',
  'NO',
]);

const KNOWN_POLICY_PREFIXES = new Set(['ABC', 'PGR', 'ASC', 'SF', 'ALL', 'GEICO', 'STATE', 'PROG', 'TPC']);

const COMPANY_NOISE_WORDS = new Set([
  'CERTIFICATE',
  'LIABILITY',
  'GENERAL',
  'POLICY',
  'COVERAGE',
  'EFFECTIVE',
  'EXPIRATION',
  'AMOUNT',
  'LIMIT',
]);

const KNOWN_INSURERS = [
  'State Farm',
  'Allstate',
  'Progressive',
  'GEICO',
  'Farmers',
  'Liberty Mutual',
  'Nationwide',
  'USAA',
  'Travelers',
  'American Family',
  'MetLife',
  'AIG',
  'CNA',
  'Zurich',
  'Hartford',
  'Chubb',
];

export function isValidPolicyNumber(value: string): boolean {
  const policy = value.toUpperCase();

  if (policy.length < 4 || !/[A-Z0-9]/.test(policy)) {
    return false;
  }
  // O read in place of 0 inside a year
  if (/^20O\d$/.test(policy) || /^\dO\d{2}$/.test(policy)) {
    return false;
  }
  if (/^\d{1,2}[/-]\d{1,2}[/-]\d{2,4}$/.test(policy)) {
    return false;
  }
  if (/^(19|20)\d{2}$/.test(policy)) {
    const year = Number(policy);
    if (year < FIRST_POLICY_YEAR || year > LAST_POLICY_YEAR) {
      return false;
    }
  }
  if (POLICY_FALSE_POSITIVES.has(policy)) {
    return false;
  }
  if (/^[A-Z-]+$/.test(policy) && !KNOWN_POLICY_PREFIXES.has(policy)) {
    return false;
  }
  return true;
}

export function cleanCompanyName(raw: string): string | null {
  const company = collapseWhitespace(raw).replace(/[.,;:]+$/, '');
  const words = company.split(' ');
  const kept = words.filter((word) => {
    const upper = word.toUpperCase();
    if (upper === 'INSURANCE' || upper === 'COMPANY') {
      return words.length > 1;
    }
    return !COMPANY_NOISE_WORDS.has(upper) && word.length > 1;
  });

  const cleaned = toTitleCase(kept.length > 0 ? kept.join(' ') : company);
  return cleaned.length > 3 ? cleaned : null;
}

const asPolicyNumber: PostProcess = (match) => {
  const value = match.text.trim().toUpperCase();
  return isValidPolicyNumber(value) ? value : null;
};

const asCompany: PostProcess = (match) => cleanCompanyName(match.text);

const asLiability = asCents(MIN_LIABILITY_DOLLARS);

export const COI_DEFINITION: DocumentDefinition = {
  documentType: 'COI',
  ocrCorrections: false,
  fields: [
    {
      fieldName: 'policyNumber',
      mode: 'first-match',
      postProcess: asPolicyNumber,
      patterns: [
        { label: 'policy-number', regex: labelled(String.raw`(?:Policy|POL)[ \t]+(?:Number|No\.?|#)`, '([A-Z0-9-]{4,20})') },
        { label: 'certificate-number', regex: labelled(String.raw`(?:Certificate|Cert)[ \t]+(?:No\.?|Number)`, '([A-Z0-9-]{6,20})') },
        { label: 'prefixed-code', regex: /\b([A-Z]{2,4}-?[0-9A-Z]{3,}(?:-[0-9A-Z]{3,})*)\b/gi },
        { label: 'policy-label', regex: new RegExp(String.raw`\bPOLICY${LABEL_GAP}([A-Z0-9-]{6,20})(?=\s|$)`, 'gi') },
        { label: 'long-number', regex: /\b([0-9]{8,15})\b/g },
      ],
    },
    {
      fieldName: 'insuranceCompany',
      mode: 'first-match',
      postProcess: asCompany,
      patterns: [
        {
          label: 'insurer-label',
          regex: labelled(String.raw`Insurer(?:[ \t]+[A-F])?|Insurance[ \t]+Company|Carrier`, '([A-Z][A-Za-z& ]{3,40})'),
        },
        { label: 'known-insurer', regex: new RegExp(String.raw`\b(${KNOWN_INSURERS.join('|')})\b`, 'gi') },
        { label: 'issued-by', regex: labelled(String.raw`Issued[ \t]+by|Underwritten[ \t]+by`, '([A-Z][A-Za-z& ]{3,40})') },
        { label: 'insurance-company-name', regex: /\b([A-Z][A-Za-z]*(?:[ \t]+[A-Z][A-Za-z]*)*[ \t]+Insurance[ \t]+Company)\b/g },
        { label: 'insurance-name', regex: /\b([A-Z][A-Za-z]*(?:[ \t]+[A-Z][A-Za-z]*)*)[ \t]+Insurance\b/g },
      ],
    },
    {
      fieldName: 'generalLiabilityAmount',
      mode: 'first-match',
      postProcess: asLiability,
      patterns: [
        {
          label: 'general-liability',
          regex: labelled(String.raw`General[ \t]+Liability|General[ \t]+Agg(?:regate)?|Aggregate|GL(?=[ \t]*:)`, AMOUNT),
        },
        { label: 'occurrence', regex: labelled(String.raw`Each[ \t]+Occurrence|Per[ \t]+Occurrence|Occurrence[ \t]+Limit`, AMOUNT) },
        { label: 'bodily-property', regex: labelled(String.raw`Bodily[ \t]+Injury|Property[ \t]+Damage|BI/PD`, AMOUNT) },
        { label: 'coverage-limit', regex: labelled('Coverage|Limit', AMOUNT) },
      ],
    },
    {
      fieldName: 'autoLiabilityAmount',
      mode: 'first-match',
      postProcess: asLiability,
      patterns: [
        {
          label: 'auto-liability',
          regex: labelled(String.raw`Auto(?:mobile)?[ \t]+Liability|Commercial[ \t]+Auto|Vehicle|AL(?=[ \t]*:)`, AMOUNT),
        },
        { label: 'single-limit', regex: labelled(String.raw`Combined[ \t]+Single[ \t]+Limit|CSL|Single[ \t]+Limit`, AMOUNT) },
        { label: 'liability-limit', regex: labelled(String.raw`Liability[ \t]+(?:Limit|Coverage)`, AMOUNT) },
      ],
    },
    {
      fieldName: 'effectiveDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [
        { label: 'effective-label', regex: labelled(String.raw`(?:Effective|Eff)(?:[ \t]+Date)?`, `(${DATE})`) },
        { label: 'period-start', regex: labelled(String.raw`(?:Policy|Coverage)[ \t]+Period`, `(${DATE})`) },
        { label: 'from-label', regex: labelled('From', `(${DATE})`) },
      ],
    },
    {
      fieldName: 'expirationDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [
        { label: 'expiration-label', regex: labelled(String.raw`(?:Expires|Expiration|Exp)(?:[ \t]+Date)?`, `(${DATE})`) },
        {
          label: 'period-end',
          regex: labelled(
            String.raw`(?:Policy|Coverage)[ \t]+Period`,
            String.raw`(?:${DATE})[ \t]+(?:to|through|-)[ \t]*(${DATE})`
          ),
        },
        { label: 'to-label', regex: labelled('To', `(${DATE})`) },
        { label: 'valid-until', regex: labelled(String.raw`(?:Valid[ \t]+)?Until`, `(${DATE})`) },
      ],
    },
  ],
  scoring: {
    weights: {
      policyNumber: 0.25,
      insuranceCompany: 0.15,
      generalLiabilityAmount: 0.2,
      autoLiabilityAmount: 0.2,
      effectiveDate: 0.1,
      expirationDate: 0.1,
    },
    tiers: [
      {
        label: 'policy-company-amount-date',
        requires: [
          ['policyNumber'],
          ['insuranceCompany'],
          ['generalLiabilityAmount', 'autoLiabilityAmount'],
          ['effectiveDate', 'expirationDate'],
        ],
        score: 0.95,
        combine: 'replace',
      },
      {
        label: 'policy-both-amounts-date',
        requires: [['policyNumber'], ['generalLiabilityAmount'], ['autoLiabilityAmount'], ['effectiveDate', 'expirationDate']],
        score: 0.85,
        combine: 'replace',
      },
      {
        label: 'policy-amount-date',
        requires: [['policyNumber'], ['generalLiabilityAmount', 'autoLiabilityAmount'], ['effectiveDate', 'expirationDate']],
        score: 0.8,
        combine: 'replace',
      },
      {
        label: 'policy-amount-or-date',
        requires: [['policyNumber'], ['generalLiabilityAmount', 'autoLiabilityAmount', 'effectiveDate', 'expirationDate']],
        score: 0.7,
        combine: 'replace',
      },
    ],
    signalBonuses: [],
    qualityBonuses: [],
  },
  gate: {
    flag: 'verified',
    threshold: 0.8,
    required: [['policyNumber'], ['expirationDate'], ['generalLiabilityAmount', 'autoLiabilityAmount']],
    expiry: { field: 'expirationDate', minDaysAhead: 30 },
  },
};
