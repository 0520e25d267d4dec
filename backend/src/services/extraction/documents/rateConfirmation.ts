import type { CandidateScorer, DocumentDefinition, PostProcess } from '../FieldSpec';
import { asDate, collapseWhitespace, parseAmount, toCents } from '../postProcessors';
import { DATE, labelled } from './patterns';

const MIN_RATE_DOLLARS = 50;
const MAX_RATE_DOLLARS = 50_000;
const MIN_WEIGHT_LBS = 100;
const MAX_WEIGHT_LBS = 80_000;

const MONEY = String.raw`\$?[ \t]*([0-9]{1,3}(?:,[0-9]{3})+(?:\.[0-9]{2})?|[0-9]+(?:\.[0-9]{2})?)`;
const CITY_STATE = String.raw`([A-Za-z][A-Za-z .'-]*?,[ \t]*[A-Za-z]{2})\b`;
const COMMODITY_FILLER = new Set(['here', 'there', 'this', 'that']);

const asRateCents: PostProcess = (match) => toCents(match.text);

/** Highest plausible rate wins; anything outside the range is dropped. */
const scoreRate: CandidateScorer = (candidate) => {
  if (typeof candidate.value !== 'number') {
    return null;
  }
  const dollars = candidate.value / 100;
  return dollars >= MIN_RATE_DOLLARS && dollars <= MAX_RATE_DOLLARS ? dollars : null;
};

const asLocation: PostProcess = (match) => {
  const [city, state] = collapseWhitespace(match.text).split(/,\s*/);
  if (!city || !state) {
    return null;
  }
  return `${city}, ${state.toUpperCase()}`;
};

const asWeight: PostProcess = (match) => {
  const pounds = parseAmount(match.text.replace(/,/g, ''));
  return pounds !== null && pounds >= MIN_WEIGHT_LBS && pounds <= MAX_WEIGHT_LBS ? Math.round(pounds) : null;
};

const asCommodity: PostProcess = (match) => {
  const commodity = collapseWhitespace(match.text).replace(/[.,-]+$/, '');
  if (commodity.length < 3 || commodity.length > 100 || COMMODITY_FILLER.has(commodity.toLowerCase())) {
    return null;
  }
  return /[A-Za-z]/.test(commodity) ? commodity : null;
};

export const RATE_CONFIRMATION_DEFINITION: DocumentDefinition = {
  documentType: 'Rate Confirmation',
  ocrCorrections: true,
  fields: [
    {
      fieldName: 'rateAmount',
      mode: 'multi-signal',
      postProcess: asRateCents,
      scorer: scoreRate,
      patterns: [
        { label: 'rate-label', regex: labelled(String.raw`rate|amount|total|line[ \t]+haul`, MONEY) },
        { label: 'compensation', regex: labelled('compensation|pay', MONEY) },
        { label: 'dollar-sign', regex: /\$[ \t]*([0-9]{1,3}(?:,[0-9]{3})+(?:\.[0-9]{2})?|[0-9]+(?:\.[0-9]{2})?)/g },
        {
          label: 'dollars-word',
          regex: /\b([0-9]{1,3}(?:,[0-9]{3})+(?:\.[0-9]{2})?|[0-9]+(?:\.[0-9]{2})?)[ \t]*(?:dollars?|usd)\b/gi,
        },
      ],
    },
    {
      fieldName: 'origin',
      mode: 'first-match',
      postProcess: asLocation,
      patterns: [
        { label: 'route-from', regex: new RegExp(String.raw`\bfrom[ \t]+${CITY_STATE}[ \t]+to\b`, 'gi') },
        { label: 'origin-label', regex: labelled(String.raw`origin|shipper|pick[ \t-]?up(?:[ \t]+location)?|from`, CITY_STATE) },
      ],
    },
    {
      fieldName: 'destination',
      mode: 'first-match',
      postProcess: asLocation,
      patterns: [
        {
          label: 'route-to',
          regex: new RegExp(String.raw`\bfrom[ \t]+[A-Za-z][A-Za-z .'-]*?,[ \t]*[A-Za-z]{2}[ \t]+to[ \t]+${CITY_STATE}`, 'gi'),
        },
        {
          label: 'destination-label',
          regex: labelled(String.raw`destination|consignee|deliver(?:y)?(?:[ \t]+(?:to|location))?|drop[ \t]*off`, CITY_STATE),
        },
      ],
    },
    {
      fieldName: 'pickupDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [{ label: 'pickup-date', regex: labelled(String.raw`(?:pick[ \t-]?up|loading|ship)(?:[ \t]+date)?`, `(${DATE})`) }],
    },
    {
      fieldName: 'deliveryDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [
        {
          label: 'delivery-date',
          regex: labelled(String.raw`(?:delivery|deliver|unload|drop[ \t]*off)(?:[ \t]+date)?`, `(${DATE})`),
        },
      ],
    },
    {
      fieldName: 'weight',
      mode: 'first-match',
      postProcess: asWeight,
      patterns: [
        { label: 'weight-label', regex: labelled('weight', '([0-9][0-9,]*)') },
        { label: 'pounds', regex: /\b([0-9][0-9,]*)[ \t]*(?:lbs?|pounds?)\b/gi },
      ],
    },
    {
      fieldName: 'commodity',
      mode: 'first-match',
      postProcess: asCommodity,
      patterns: [
        { label: 'commodity-label', regex: /\b(?:commodity|product|cargo)[ \t]*:[ \t]*([A-Za-z][A-Za-z ,.-]*)/gi },
        { label: 'description', regex: /\b(?:description|desc)[ \t]*:[ \t]*([A-Za-z][A-Za-z ,.-]*)/gi },
      ],
    },
  ],
  scoring: {
    weights: {
      rateAmount: 0.4,
      origin: 0.2,
      destination: 0.2,
      pickupDate: 0.1,
      deliveryDate: 0.05,
      weight: 0.03,
      commodity: 0.02,
    },
    tiers: [
      {
        label: 'rate-route-date',
        requires: [['rateAmount'], ['origin'], ['destination'], ['pickupDate', 'deliveryDate']],
        score: 0.95,
        combine: 'replace',
      },
      { label: 'rate-route', requires: [['rateAmount'], ['origin'], ['destination']], score: 0.85, combine: 'replace' },
      { label: 'rate-location', requires: [['rateAmount'], ['origin', 'destination']], score: 0.7, combine: 'replace' },
      { label: 'rate', requires: [['rateAmount']], score: 0.6, combine: 'replace' },
    ],
    signalBonuses: [],
    qualityBonuses: [],
  },
  gate: {
    flag: 'verified',
    threshold: 0.8,
    required: [['rateAmount'], ['origin'], ['destination']],
  },
};
