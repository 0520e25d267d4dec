import type { DocumentDefinition, PostProcess } from '../FieldSpec';
import { asDate, asFlag, collapseWhitespace, toHeadlineCase } from '../postProcessors';
import { DATE, labelled } from './patterns';

const MIN_SIGNER_NAME_LENGTH = 4;
const MIN_KEY_TERM_LENGTH = 11;

// OCR commonly swaps i/1 and e/3 in these words
const SIGNED = String.raw`(?:Signed|S[0-9]gn[e3]d)`;
const SIGNATURE = String.raw`(?:Signature|S[0-9]gnatur[e3])`;

const asSignerName: PostProcess = (match) => {
  const name = collapseWhitespace(match.text);
  return name.length >= MIN_SIGNER_NAME_LENGTH ? name : null;
};

const asAgreementType: PostProcess = (match) => toHeadlineCase(match.raw);

const asKeyTerm: PostProcess = (match) => {
  const term = collapseWhitespace(match.raw);
  return term.length >= MIN_KEY_TERM_LENGTH ? term : null;
};

export const AGREEMENT_DEFINITION: DocumentDefinition = {
  documentType: 'Agreement',
  ocrCorrections: false,
  fields: [
    {
      fieldName: 'signatureDetected',
      mode: 'signals',
      minSignals: 2,
      postProcess: asFlag,
      patterns: [
        {
          label: 'digital-signature',
          regex: new RegExp(String.raw`\b(?:Digitally|D[0-9]g[0-9]tally|Electronic(?:ally)?)[ \t]+${SIGNED}[ \t]+by`, 'gi'),
          strong: true,
        },
        { label: 'driver-signature-line', regex: new RegExp(String.raw`\b(?:Driver|Dr[0-9]v[e3]r)[ \t]+${SIGNATURE}:`, 'gi'), strong: true },
        { label: 'signature-line', regex: new RegExp(String.raw`\b${SIGNATURE}:`, 'gi'), strong: true },
        {
          label: 'signed-by',
          regex: new RegExp(String.raw`\b${SIGNED}[ \t]+by[ \t]*:*[ \t]*([A-Za-z][A-Za-z0-9 .]*)`, 'gi'),
          strong: true,
          postProcess: asSignerName,
        },
        {
          label: 'signature-marks',
          regex: new RegExp(String.raw`\bX[ \t]*[_-]{3,}|\b(?:${SIGNATURE}|${SIGNED}|Sign|Name|By)[ \t]*:?[ \t]*_{4,}`, 'gi'),
        },
        { label: 'date-signed', regex: new RegExp(String.raw`\bDat[e3][ \t]+${SIGNED}[ \t]*:*[ \t]*(?:${DATE})`, 'gi'), strong: true },
        { label: 'signed-on', regex: new RegExp(String.raw`\b${SIGNED}[ \t]+on[ \t]*:*[ \t]*(?:${DATE})`, 'gi'), strong: true },
        {
          label: 'acceptance',
          regex: /\bI[ \t]+(?:agree|accept|acknowledge)\b.*\b(?:terms|agreement|contract|conditions|responsibility)/gi,
          strong: true,
        },
      ],
    },
    {
      fieldName: 'signingDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [
        { label: 'date-signed', regex: labelled(String.raw`Date[ \t]+Signed|Signed[ \t]+on|Signature[ \t]+Date`, `(${DATE})`) },
        { label: 'date-label', regex: labelled('Date', `(${DATE})`) },
        { label: 'agreed-on', regex: labelled(String.raw`Agreed[ \t]+on|Agreement[ \t]+Date`, `(${DATE})`) },
      ],
    },
    {
      fieldName: 'agreementType',
      mode: 'first-match',
      postProcess: asAgreementType,
      patterns: [
        {
          label: 'party-agreement',
          regex: /\b(?:Driver|Dr[0-9]v[e3]r|Independent[ \t]+Contractor|Carrier)[ \t]+(?:Agreement|Agr[e3][e3]m[e3]nt)\b/gi,
        },
        { label: 'transportation', regex: /\bTransportation[ \t]+Agreement\b/gi },
        { label: 'freight-broker', regex: /\bFreight[ \t]+Broker[ \t]+Agreement\b/gi },
        { label: 'freight', regex: /\bFreight[ \t]+Agreement\b/gi },
        { label: 'load', regex: /\bLoad[ \t]+Agreement\b/gi },
        { label: 'terms-title', regex: /^[ \t]*Terms[ \t]+(?:and[ \t]+Conditions|of[ \t]+Service)\b/gim },
        { label: 'contract', regex: /\b(?:Employment|Service)[ \t]+Contract\b/gi },
        { label: 'nda', regex: /\bNon[ \t-]?Disclosure[ \t]+Agreement\b|\bNDA\b/gi },
      ],
    },
    {
      fieldName: 'keyTerms',
      mode: 'collect',
      maxValues: 15,
      maxPerPattern: 3,
      postProcess: asKeyTerm,
      patterns: [
        { label: 'liability', regex: /\b(?:liability|insurance|coverage)\b.*?\b(?:amount|limit)\b[ \t]*:*[ \t]*\$?[0-9][0-9,]*(?:\.[0-9]{2})?/gi },
        { label: 'payment', regex: /\b(?:payment|compensation|rate)\b.*?(?:\bper\b|@).*?\b(?:mile|load|hour)\b/gi },
        { label: 'equipment', regex: /\b(?:equipment|vehicle|truck)\b.*?\b(?:requirements?|specifications?)\b/gi },
        { label: 'termination', regex: /\b(?:termination|cancel|terminate)\b.*?\b(?:notice|days|immediately)\b/gi },
        { label: 'compliance', regex: /\b(?:compliance|regulations?|DOT|FMCSA)\b.*?\b(?:requirements?|standards?)\b/gi },
      ],
    },
  ],
  scoring: {
    weights: {},
    tiers: [
      {
        label: 'signature-type-date',
        requires: [['signatureDetected'], ['agreementType'], ['signingDate']],
        score: 0.95,
        combine: 'replace',
      },
      { label: 'signature-type', requires: [['signatureDetected'], ['agreementType']], score: 0.85, combine: 'replace' },
      { label: 'signature-terms', requires: [['signatureDetected'], ['keyTerms']], score: 0.75, combine: 'replace' },
      { label: 'signature', requires: [['signatureDetected']], score: 0.7, combine: 'replace' },
      { label: 'type-terms', requires: [['agreementType'], ['keyTerms']], score: 0.6, combine: 'replace' },
      { label: 'terms', requires: [['keyTerms']], score: 0.4, combine: 'replace' },
    ],
    signalBonuses: [
      {
        field: 'signatureDetected',
        tiers: [
          { minSignals: 6, bonus: 0.25 },
          { minSignals: 4, bonus: 0.15 },
          { minSignals: 3, bonus: 0.1 },
          { minSignals: 2, bonus: 0.05 },
        ],
      },
    ],
    qualityBonuses: [],
  },
  gate: {
    flag: 'signed',
    threshold: 0.9,
    required: [],
  },
};
