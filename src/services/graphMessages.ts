import { z } from 'zod';
import { MAIL_IMPORTANCES } from '../shared/types.js';
import type {
  AccountRecord,
  BodyType,
  MailImportance,
  MailMessageRecord,
  NewMailMessage,
} from '../shared/types.js';

const recipientSchema = z.object({
  emailAddress: z.object({
    name: z.string().nullish(),
    address: z.string().nullish(),
  }).nullish(),
});

export const graphMessageSchema = z.object({
  id: z.string().min(1),
  internetMessageId: z.string().nullish(),
  subject: z.string().nullish(),
  bodyPreview: z.string().nullish(),
  body: z.object({
    contentType: z.string().nullish(),
    content: z.string().nullish(),
  }).nullish(),
  importance: z.string().nullish(),
  isRead: z.boolean().nullish(),
  hasAttachments: z.boolean().nullish(),
  receivedDateTime: z.string().nullish(),
  sentDateTime: z.string().nullish(),
  from: recipientSchema.nullish(),
  sender: recipientSchema.nullish(),
  toRecipients: z.array(recipientSchema).nullish(),
  ccRecipients: z.array(recipientSchema).nullish(),
  bccRecipients: z.array(recipientSchema).nullish(),
  parentFolderId: z.string().nullish(),
  categories: z.array(z.string()).nullish(),
  '@removed': z.object({ reason: z.string().nullish() }).nullish(),
});

export type GraphMessage = z.infer<typeof graphMessageSchema>;
type GraphRecipient = z.infer<typeof recipientSchema>;

export interface MailQueryFilters {
  dateFrom?: Date;
  dateTo?: Date;
  senderEmail?: string;
  isRead?: boolean;
  importance?: MailImportance;
  subjectContains?: string;
  search?: string;
}

export interface OutgoingMail {
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  body: string;
  bodyType: BodyType;
  importance?: MailImportance;
}

const odataString = (value: string) => `'${value.replace(/'/g, "''")}'`;

/**
 * Builds the `$filter` expression for a message listing. Returns null when
 * no filter applies.
 */
export const buildMessageFilter = (filters: MailQueryFilters): string | null => {
  const clauses: string[] = [];
  if (filters.dateFrom) {
    clauses.push(`receivedDateTime ge ${filters.dateFrom.toISOString()}`);
  }
  if (filters.dateTo) {
    clauses.push(`receivedDateTime le ${filters.dateTo.toISOString()}`);
  }
  if (filters.senderEmail) {
    clauses.push(`from/emailAddress/address eq ${odataString(filters.senderEmail.trim().toLowerCase())}`);
  }
  if (filters.isRead !== undefined) {
    clauses.push(`isRead eq ${filters.isRead ? 'true' : 'false'}`);
  }
  if (filters.importance) {
    clauses.push(`importance eq ${odataString(filters.importance)}`);
  }
  if (filters.subjectContains) {
    clauses.push(`contains(subject, ${odataString(filters.subjectContains)})`);
  }
  return clauses.length > 0 ? clauses.join(' and ') : null;
};

/** Pulls the opaque cursor out of an `@odata.deltaLink`. */
export const extractDeltaToken = (deltaLink: string): string | null => {
  try {
    const url = new URL(deltaLink);
    return url.searchParams.get('$deltatoken') ?? url.searchParams.get('$skiptoken');
  } catch {
    return null;
  }
};

export const isRemovedEntry = (message: GraphMessage) => message['@removed'] != null;

const addressOf = (recipient: GraphRecipient | null | undefined) =>
  recipient?.emailAddress?.address?.trim().toLowerCase() ?? '';

const addressesOf = (recipients: GraphRecipient[] | null | undefined) =>
  (recipients ?? []).map(addressOf).filter(Boolean);

const normalizeImportance = (value: string | null | undefined): MailImportance => {
  const lowered = String(value ?? '').toLowerCase();
  return MAIL_IMPORTANCES.find((importance) => importance === lowered) ?? 'normal';
};

const parseDate = (value: string | null | undefined): Date | null => {
  if (!value) {
    return null;
  }
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? new Date(parsed) : null;
};

export const toMailMessage = (
  account: Pick<AccountRecord, 'id' | 'email'>,
  folderId: string,
  message: GraphMessage,
): NewMailMessage => {
  const senderEmail = addressOf(message.from ?? message.sender);
  return {
    accountId: account.id,
    messageId: message.id,
    internetMessageId: message.internetMessageId ?? null,
    subject: message.subject ?? '',
    senderEmail,
    senderName: (message.from ?? message.sender)?.emailAddress?.name ?? null,
    recipients: addressesOf(message.toRecipients),
    ccRecipients: addressesOf(message.ccRecipients),
    bccRecipients: addressesOf(message.bccRecipients),
    bodyPreview: message.bodyPreview ?? null,
    bodyContent: message.body?.content ?? null,
    bodyContentType: String(message.body?.contentType ?? '').toLowerCase() === 'html' ? 'html' : 'text',
    importance: normalizeImportance(message.importance),
    isRead: message.isRead ?? false,
    hasAttachments: message.hasAttachments ?? false,
    receivedAt: parseDate(message.receivedDateTime) ?? new Date(Date.now()),
    sentAt: parseDate(message.sentDateTime),
    direction: senderEmail && senderEmail === account.email.toLowerCase() ? 'sent' : 'received',
    folderId: message.parentFolderId ?? folderId,
    categories: message.categories ?? [],
  };
};

const toRecipients = (addresses: string[] | undefined) =>
  (addresses ?? []).map((address) => ({ emailAddress: { address } }));

export const toGraphOutgoingMessage = (mail: OutgoingMail) => ({
  subject: mail.subject,
  body: {
    contentType: mail.bodyType === 'html' ? 'HTML' : 'Text',
    content: mail.body,
  },
  importance: mail.importance ?? 'normal',
  toRecipients: toRecipients(mail.to),
  ccRecipients: toRecipients(mail.cc),
  bccRecipients: toRecipients(mail.bcc),
});

export type GraphOutgoingMessage = ReturnType<typeof toGraphOutgoingMessage>;

export const toForwardPayload = (account: Pick<AccountRecord, 'id' | 'email'>, message: MailMessageRecord) => ({
  accountId: account.id,
  accountEmail: account.email,
  messageId: message.messageId,
  internetMessageId: message.internetMessageId,
  subject: message.subject,
  sender: { email: message.senderEmail, name: message.senderName },
  recipients: message.recipients,
  ccRecipients: message.ccRecipients,
  receivedAt: message.receivedAt.toISOString(),
  sentAt: message.sentAt ? message.sentAt.toISOString() : null,
  bodyPreview: message.bodyPreview,
  bodyContent: message.bodyContent,
  bodyContentType: message.bodyContentType,
  importance: message.importance,
  isRead: message.isRead,
  hasAttachments: message.hasAttachments,
  direction: message.direction,
  folderId: message.folderId,
  categories: message.categories,
});
