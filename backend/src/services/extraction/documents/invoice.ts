import type { DocumentDefinition, PostProcess } from '../FieldSpec';
import { asCents, asDate, asText, collapseWhitespace, toCents } from '../postProcessors';
import { DATE, LABEL_GAP, labelled } from './patterns';

const MONEY = String.raw`\$?[ \t]*([0-9]{1,3}(?:,[0-9]{3})+(?:\.[0-9]{2})?|[0-9]+(?:\.[0-9]{2})?)`;
const INVOICE_ID = '([A-Z0-9_-]{3,20})';
const COMPANY = String.raw`([A-Za-z0-9][A-Za-z0-9 &.,'-]{2,60})`;
const COMPANY_SUFFIX = 'LLC|Inc|Corp|Co|Company|Logistics|Transportation|Transport|Freight|Trucking';
const MAX_LINE_ITEMS = 20;

const CHARGE_WORDS =
  /\b(?:freight|charges?|fees?|surcharge|accessorials?|detention|lumper|line[ \t]+haul|layover|tolls?|stop[ \t]+off)\b/i;
const TOTAL_WORDS = /\b(?:sub[ \t-]*total|total|tax|vat|balance|amount[ \t]+due)\b/i;

/** Identifiers without a digit are words caught after the label ("Invoice Date"). */
const asInvoiceNumber: PostProcess = (match) => {
  const value = match.text.toUpperCase();
  return /[0-9]/.test(value) ? value : null;
};

const asCompanyName: PostProcess = (match) => {
  const value = collapseWhitespace(match.text).replace(/[ ,;:-]+$/, '');
  return value.length >= 3 && /[A-Za-z]/.test(value) ? value : null;
};

const asPositiveCents: PostProcess = (match) => {
  const cents = toCents(match.text);
  return cents !== null && cents > 0 ? cents : null;
};

/** `Description: dollars` for charge lines; subtotal, tax and total lines are not items. */
const asLineItem: PostProcess = (match) => {
  const description = collapseWhitespace(match.groups[0] ?? '');
  const cents = toCents(match.groups[1] ?? '');
  if (cents === null || cents <= 0 || !CHARGE_WORDS.test(description) || TOTAL_WORDS.test(description)) {
    return null;
  }
  return `${description}: ${(cents / 100).toFixed(2)}`;
};

function companyLabel(label: string): RegExp {
  return new RegExp(String.raw`\b(?:${label})[ \t]*:[ \t]*\n?[ \t]*${COMPANY}`, 'gi');
}

export const INVOICE_DEFINITION: DocumentDefinition = {
  documentType: 'Invoice',
  ocrCorrections: true,
  fields: [
    {
      fieldName: 'invoiceNumber',
      mode: 'first-match',
      postProcess: asInvoiceNumber,
      patterns: [
        {
          label: 'invoice-label',
          regex: new RegExp(String.raw`\binvoice[ \t]*(?:#|number|no\.?)[ \t]*:?[ \t]*${INVOICE_ID}`, 'gi'),
        },
        { label: 'inv-label', regex: new RegExp(String.raw`\binv[ \t]*[#:.][ \t]*${INVOICE_ID}`, 'gi') },
        {
          label: 'bill-label',
          regex: new RegExp(String.raw`\bbill[ \t]*(?:#|number|no\.?)[ \t]*:?[ \t]*${INVOICE_ID}`, 'gi'),
        },
        { label: 'invoice-word', regex: new RegExp(String.raw`\binvoice[ \t]+${INVOICE_ID}`, 'gi') },
      ],
    },
    {
      fieldName: 'invoiceDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [
        { label: 'invoice-date', regex: labelled(String.raw`(?:invoice|billing|issue)[ \t]+date`, `(${DATE})`) },
        {
          label: 'date-label',
          regex: labelled(String.raw`(?<!(?:due|ship|delivery|pickup)[ \t]*)date`, `(${DATE})`),
        },
      ],
    },
    {
      fieldName: 'dueDate',
      mode: 'first-match',
      postProcess: asDate,
      patterns: [{ label: 'due-date', regex: labelled(String.raw`due[ \t]+date|payment[ \t]+due|due`, `(${DATE})`) }],
    },
    {
      fieldName: 'vendorName',
      mode: 'first-match',
      postProcess: asCompanyName,
      patterns: [
        { label: 'vendor-label', regex: companyLabel(String.raw`remit[ \t]+to|vendor|carrier|sold[ \t]+by|from`) },
        {
          label: 'company-suffix',
          regex: new RegExp(String.raw`\b((?:[A-Z][A-Za-z0-9&'-]*[ \t]+){1,5}(?:${COMPANY_SUFFIX})\b\.?)`, 'g'),
        },
      ],
    },
    {
      fieldName: 'customerName',
      mode: 'first-match',
      postProcess: asCompanyName,
      patterns: [
        {
          label: 'customer-label',
          regex: companyLabel(String.raw`bill[ \t]+to|sold[ \t]+to|ship[ \t]+to|deliver[ \t]+to|customer|consignee`),
        },
      ],
    },
    {
      fieldName: 'subtotal',
      mode: 'first-match',
      postProcess: asCents(),
      patterns: [{ label: 'subtotal-label', regex: labelled(String.raw`sub[ \t-]*total`, MONEY) }],
    },
    {
      fieldName: 'taxAmount',
      mode: 'first-match',
      postProcess: asCents(),
      patterns: [
        {
          label: 'tax-label',
          regex: new RegExp(String.raw`\b(?:sales[ \t]+tax|tax|vat)(?:[ \t]*\([0-9.]+%\))?${LABEL_GAP}${MONEY}`, 'gi'),
        },
      ],
    },
    {
      fieldName: 'totalAmount',
      mode: 'first-match',
      postProcess: asPositiveCents,
      patterns: [
        {
          label: 'grand-total',
          regex: labelled(
            String.raw`grand[ \t]+total|invoice[ \t]+total|total[ \t]+amount|total[ \t]+due|final[ \t]+total`,
            MONEY
          ),
        },
        {
          label: 'total-label',
          regex: labelled(String.raw`(?<!sub[ \t-]*)total|amount[ \t]+due|balance(?:[ \t]+due)?`, MONEY),
        },
      ],
    },
    {
      fieldName: 'paymentTerms',
      mode: 'first-match',
      postProcess: asText,
      patterns: [
        {
          label: 'terms-label',
          regex: labelled(String.raw`payment[ \t]+terms|terms`, '([A-Za-z0-9][A-Za-z0-9 ]{2,19})'),
        },
        {
          label: 'common-terms',
          regex: /\b(net[ \t]+[0-9]{1,3}|cod|cash[ \t]+on[ \t]+delivery|due[ \t]+on[ \t]+receipt|prepaid)\b/gi,
        },
      ],
    },
    {
      fieldName: 'lineItems',
      mode: 'collect',
      maxValues: MAX_LINE_ITEMS,
      postProcess: asLineItem,
      patterns: [
        {
          label: 'charge-line',
          regex:
            /^[ \t]*([A-Za-z][A-Za-z \t/&-]*)[ \t]*:?[ \t]*\$[ \t]*([0-9]{1,3}(?:,[0-9]{3})+(?:\.[0-9]{2})?|[0-9]+(?:\.[0-9]{2})?)[ \t]*$/gm,
        },
      ],
    },
  ],
  scoring: {
    weights: {
      invoiceNumber: 0.25,
      totalAmount: 0.2,
      vendorName: 0.15,
      invoiceDate: 0.1,
      customerName: 0.1,
      lineItems: 0.1,
      subtotal: 0.05,
      dueDate: 0.05,
    },
    tiers: [
      {
        label: 'number-total-vendor-date',
        requires: [['invoiceNumber'], ['totalAmount'], ['vendorName'], ['invoiceDate']],
        score: 0.95,
        combine: 'max',
      },
      {
        label: 'number-total-vendor',
        requires: [['invoiceNumber'], ['totalAmount'], ['vendorName']],
        score: 0.85,
        combine: 'max',
      },
      { label: 'number-total', requires: [['invoiceNumber'], ['totalAmount']], score: 0.65, combine: 'max' },
      { label: 'number-or-total', requires: [['invoiceNumber', 'totalAmount']], score: 0.4, combine: 'max' },
    ],
    signalBonuses: [],
    qualityBonuses: [
      { field: 'lineItems', bonus: 0.05, when: (value) => Array.isArray(value) && value.length > 1 },
    ],
  },
  gate: {
    flag: 'verified',
    threshold: 0.8,
    required: [['invoiceNumber'], ['totalAmount']],
  },
};
