import type { DocumentDefinition, PostProcess } from '../FieldSpec';
import { asDate, asUpperCase, collapseWhitespace, toTitleCase } from '../postProcessors';
import { DATE, LABEL_GAP } from './patterns';

const STREET_SUFFIX = 'ST|STREET|AVE|AVENUE|RD|ROAD|BLVD|BOULEVARD|DR|DRIVE|LN|LANE';

/** Card labels; a name ends where one of these starts. */
const LABEL_TOKENS = new Set([
  'LICENSE',
  'CDL',
  'DL',
  'EXP',
  'EXPIRES',
  'CLASS',
  'DOB',
  'SEX',
  'HGT',
  'WGT',
  'EYES',
  'HAIR',
  'ISS',
  'ADDRESS',
]);

const LICENSE_FALSE_POSITIVES = new Set([
  'COMMERCIAL',
  'DRIVER',
  'LICENSE',
  'EXPIRES',
  'ADDRESS',
  'BIRTHDAY',
  'WEIGHT',
  'HEIGHT',
  'EYES',
  'HAIR',
]);

function cleanDriverName(raw: string): string | null {
  const words: string[] = [];

  for (const word of collapseWhitespace(raw).split(' ')) {
    if (LABEL_TOKENS.has(word.toUpperCase().replace(/[^A-Z]/g, ''))) {
      if (words.length > 0) break;
      continue;
    }
    if (/^(?=.*\d)[A-Z0-9]{7,}$/i.test(word) || /\d+[/-]\d+/.test(word)) {
      continue;
    }
    words.push(word);
  }

  let name = words.join(' ');
  const parts = name.split(',');
  if (parts.length === 2) {
    name = `${parts[1].trim()} ${parts[0].trim()}`;
  }

  name = toTitleCase(name.trim());
  return name.length > 3 ? name : null;
}

const asDriverName: PostProcess = (match) => {
  // FIRST/LAST labels capture the two halves separately
  const [first, last] = match.groups;
  if (first && last) {
    return cleanDriverName(`${first} ${last}`);
  }
  return cleanDriverName(match.text);
};

const asLastFirstName: PostProcess = (match) => {
  const [last, first] = match.groups;
  return last && first ? cleanDriverName(`${last}, ${first}`) : null;
};

const asLicenseNumber: PostProcess = (match) => {
  const value = match.text.toUpperCase();
  if (value.length < 7 || value.length > 15 || !/\d/.test(value) || LICENSE_FALSE_POSITIVES.has(value)) {
    return null;
  }
  return value;
};

const asAddress: PostProcess = (match) => {
  const value = collapseWhitespace(match.text);
  return value.length > 10 ? value : null;
};

export const CDL_DEFINITION: DocumentDefinition = {
  documentType: 'CDL',
  ocrCorrections: false,
  fields: [
    {
      fieldName: 'driverName',
      mode: 'first-match',
      postProcess: asDriverName,
      patterns: [
        { label: 'name-label', regex: /\bNAME[ \t]*:[ \t]*([A-Z][A-Za-z'-]+(?:[ \t]+[A-Z][A-Za-z'-]+){1,3})/gi },
        {
          label: 'last-comma-first',
          regex: /\b([A-Z]{2,}),[ \t]*([A-Z][A-Za-z]{2,}(?:[ \t]+[A-Z][A-Za-z]+)*)/g,
          postProcess: asLastFirstName,
        },
        {
          label: 'first-last-labels',
          regex: /\bFIRST(?:[ \t]+NAME)?[ \t]*:[ \t]*([A-Z][A-Za-z]+)[\s\S]*?\bLAST(?:[ \t]+NAME)?[ \t]*:[ \t]*([A-Z][A-Za-z]+)/gi,
        },
        { label: 'name-line', regex: /^([A-Z][a-z]+[ \t]+[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)?)$/gm },
      ],
    },
    {
      fieldName: 'licenseNumber',
      mode: 'first-match',
      postProcess: asLicenseNumber,
      patterns: [
        {
          label: 'license-label',
          regex: /\b(?:DL|LIC(?:ENSE)?|CDL)(?:[ \t]*(?:NO\.?|NUMBER))?[ \t]*[:#]*[ \t]*([A-Z0-9]{5,20})\b/gi,
        },
        { label: 'standalone', regex: /\b([A-Z0-9]{8,12})\b/g },
        { label: 'state-prefixed', regex: /\b(?:CA|TX|FL|NY|IL|PA|OH|GA|NC|MI)[ \t]*([A-Z0-9]{7,12})\b/g },
      ],
    },
    {
      fieldName: 'expirationDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [
        { label: 'exp-label', regex: new RegExp(String.raw`\bEXP(?:IRES|IRATION)?(?:[ \t]+DATE)?${LABEL_GAP}(${DATE})`, 'gi') },
        {
          label: 'standalone-date',
          regex: /(?<!(?:DOB|BIRTH|ISS|ISSUED)[ \t]*:?[ \t]*)\b(\d{1,2}[/-]\d{1,2}[/-]\d{4})\b/gi,
        },
      ],
    },
    {
      fieldName: 'licenseClass',
      mode: 'first-match',
      postProcess: asUpperCase,
      patterns: [
        { label: 'class-label', regex: /\bCLASS[ \t]*:?[ \t]*([ABC])\b/gi },
        { label: 'class-cdl', regex: /\b([ABC])[ \t]+CDL\b/gi },
      ],
    },
    {
      fieldName: 'address',
      mode: 'first-match',
      postProcess: asAddress,
      patterns: [
        {
          label: 'address-label',
          regex: /\b(?:ADDRESS|Address|ADDR)[ \t]*:?[ \t]*(\d{1,6}[ \t]+[^\n]+?(?:\n[^\n]+?)?[A-Z]{2}[ \t]+\d{5}(?:-\d{4})?)/g,
        },
        {
          label: 'street-line',
          regex: new RegExp(String.raw`\b(\d{1,5}[ \t]+[A-Za-z][A-Za-z \t]*?[ \t](?:${STREET_SUFFIX})\b\.?)(?!\d)`, 'gi'),
        },
      ],
    },
    {
      fieldName: 'state',
      mode: 'first-match',
      postProcess: asUpperCase,
      patterns: [
        { label: 'state-label', regex: /\b(?:STATE|State|ST)[ \t]*:[ \t]*([A-Z]{2})\b/g },
        { label: 'zip-state', regex: /\b([A-Z]{2})[ \t]+\d{5}(?:-\d{4})?\b/g },
      ],
    },
  ],
  scoring: {
    weights: {
      driverName: 0.35,
      expirationDate: 0.35,
      licenseNumber: 0.15,
      licenseClass: 0.1,
      address: 0.03,
      state: 0.02,
    },
    tiers: [
      { label: 'name-and-expiry', requires: [['driverName'], ['expirationDate']], score: 0.95, combine: 'max' },
      {
        label: 'name-or-expiry',
        requires: [['driverName', 'expirationDate']],
        minFields: 2,
        score: 0.7,
        combine: 'max',
      },
    ],
    signalBonuses: [],
    qualityBonuses: [],
  },
  gate: {
    flag: 'verified',
    threshold: 0.9,
    required: [['driverName'], ['expirationDate']],
    expiry: { field: 'expirationDate', minDaysAhead: 30 },
  },
};
