import type { DocumentDefinition, PostProcess } from '../FieldSpec';
import { asDate, asFlag, collapseWhitespace } from '../postProcessors';
import { DATE, labelled } from './patterns';

const MAX_NOTES_LENGTH = 500;
const HONORIFIC = String.raw`(?:(?:mr|ms|mrs|dr)\.?[ \t]+)?`;
const NAME = String.raw`([A-Za-z][A-Za-z \t]{2,30})`;

const RECEIVER_DENYLIST = [
  'date',
  'time',
  'signature',
  'line',
  'print',
  'page',
  'delivery',
  'package',
  'condition',
  'satisfied',
  'front door',
  'good',
  'excellent',
  'poor',
  'damaged',
  'notes',
  'comments',
  'remarks',
];

const asReceiverName: PostProcess = (match) => {
  const name = collapseWhitespace(match.text);
  return name.length >= 2 ? name : null;
};

const asNote: PostProcess = (match) => {
  const note = collapseWhitespace(match.text).replace(/[.;]+$/, '');
  return note === '' ? null : note;
};

export const POD_DEFINITION: DocumentDefinition = {
  documentType: 'POD',
  ocrCorrections: true,
  fields: [
    {
      fieldName: 'deliveryConfirmed',
      mode: 'first-match',
      postProcess: asFlag,
      patterns: [
        { label: 'delivery-confirmed', regex: /\bdelivery[ \t]+confirmed?\b/gi },
        { label: 'delivered-successfully', regex: /\bdelivered[ \t]+successfully\b/gi },
        { label: 'goods-delivered', regex: /\b(?:package|shipment|freight|cargo|goods)[ \t]+delivered\b/gi },
        { label: 'delivery-complete', regex: /\bdelivery[ \t]+completed?\b/gi },
        { label: 'good-condition', regex: /\breceived[ \t]+in[ \t]+good[ \t]+condition\b/gi },
        { label: 'delivery-accepted', regex: /\bdelivery[ \t]+accepted\b/gi },
        { label: 'status-delivered', regex: /\bstatus[ \t]*:?[ \t]*delivered\b/gi },
        { label: 'proof-of-delivery', regex: /\bproof[ \t]+of[ \t]+delivery\b/gi },
        { label: 'pod-confirmation', regex: /\bpod[ \t]+confirmation\b/gi },
        {
          label: 'document-type',
          regex: /\b(?:pod|delivery[ \t]+receipt|consignee[ \t]+receipt|freight[ \t]+receipt|delivery[ \t]+note|shipment[ \t]+receipt)\b/gi,
        },
      ],
    },
    {
      fieldName: 'signaturePresent',
      mode: 'signals',
      minSignals: 1,
      postProcess: asFlag,
      patterns: [
        { label: 'signature-label', regex: /\bsignature[ \t]*:[ \t]*[A-Za-z]/gi },
        { label: 'signed-by', regex: /\bsigned[ \t]+by\b/gi },
        { label: 'received-by', regex: /\breceived[ \t]+by\b/gi },
        { label: 'accepted-by', regex: /\baccepted[ \t]+by\b/gi },
        { label: 'electronic', regex: /\b(?:electronically[ \t]+signed|digital[ \t]+signature|signed[ \t]+digitally)\b/gi },
        { label: 'on-file', regex: /\bsignature[ \t]+on[ \t]+file\b/gi },
        { label: 'marked', regex: /\*{2,}.*signature.*\*{2,}|_{3,}.*signature.*_{3,}/gi },
        { label: 'keyword', regex: /\bsign(?:ed|ature)\b/gi },
      ],
    },
    {
      fieldName: 'receiverName',
      mode: 'multi-signal',
      postProcess: asReceiverName,
      denylist: RECEIVER_DENYLIST,
      patterns: [
        { label: 'received-by', regex: labelled(String.raw`(?:received|delivered|signed)[ \t]+(?:to|by)`, HONORIFIC + NAME) },
        { label: 'consignee', regex: labelled('consignee', HONORIFIC + NAME) },
        { label: 'recipient', regex: labelled('recipient', HONORIFIC + NAME) },
        { label: 'customer', regex: labelled('customer', HONORIFIC + NAME) },
        { label: 'name', regex: labelled('name', NAME) },
        { label: 'contact', regex: labelled('contact', NAME) },
        { label: 'after-signature', regex: new RegExp(String.raw`\bsignature[ \t]*:?[ \t]*[_-]*[ \t]*${NAME}`, 'gi') },
      ],
    },
    {
      fieldName: 'deliveryDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [
        { label: 'delivered-on', regex: labelled(String.raw`(?:delivered|delivery|received)(?:[ \t]+(?:on|at))?`, `(${DATE})`) },
        { label: 'delivery-date', regex: labelled(String.raw`delivery[ \t]+date`, `(${DATE})`) },
        { label: 'any-date', regex: new RegExp(String.raw`\b(${DATE})\b`, 'g') },
      ],
    },
    {
      fieldName: 'deliveryNotes',
      mode: 'collect',
      maxValues: 5,
      joinWith: '. ',
      maxLength: MAX_NOTES_LENGTH,
      postProcess: asNote,
      patterns: [
        { label: 'notes', regex: /\b(?:delivery[ \t]+)?notes?\b[ \t]*:?[ \t]*([^\n]{10,200})/gi },
        { label: 'instructions', regex: /\b(?:special[ \t]+)?instructions?\b[ \t]*:?[ \t]*([^\n]{10,200})/gi },
        { label: 'comments', regex: /\bcomments?\b[ \t]*:?[ \t]*([^\n]{10,200})/gi },
        { label: 'remarks', regex: /\bremarks?\b[ \t]*:?[ \t]*([^\n]{10,200})/gi },
        { label: 'observations', regex: /\bobservations?\b[ \t]*:?[ \t]*([^\n]{5,100})/gi },
        { label: 'condition', regex: /\bcondition[ \t]*:[ \t]*([^\n]{5,100})/gi },
        { label: 'condition-phrase', regex: /\b((?:good|poor|damaged|excellent)[ \t]+condition)\b/gi },
        { label: 'damage', regex: /\b(damage[sd]?[ \t]*:?[ \t]*[^\n]{5,100})/gi },
        { label: 'exception', regex: /\b(exception[ \t]*:?[ \t]*[^\n]{5,100})/gi },
      ],
    },
  ],
  scoring: {
    weights: {
      deliveryConfirmed: 0.4,
      signaturePresent: 0.25,
      deliveryDate: 0.2,
      receiverName: 0.1,
      deliveryNotes: 0.05,
    },
    tiers: [],
    signalBonuses: [],
    qualityBonuses: [
      { field: 'deliveryConfirmed', bonus: 0.02, when: (_value, detail) => detail.patternLabel !== 'document-type' },
      { field: 'receiverName', bonus: 0.02, when: (value) => typeof value === 'string' && value.length > 5 },
      { field: 'deliveryNotes', bonus: 0.01, when: (value) => typeof value === 'string' && value.length > 20 },
    ],
  },
  gate: {
    flag: 'completed',
    threshold: 0.8,
    required: [['deliveryConfirmed']],
  },
};
