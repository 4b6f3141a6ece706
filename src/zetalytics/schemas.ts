/**
 * Response shapes of the Zetalytics endpoints.
 *
 * Decoding is lenient: a document without a `results` list decodes to no entries, and
 * entries that do not fit their schema are dropped one by one.
 */

import { z } from 'zod';

export const resultsEnvelopeSchema = z.object({
  results: z.array(z.unknown()),
});

export const dnsRecordSchema = z.object({
  rrtype: z.string(),
  value: z.string(),
});

/** `/subdomains`, `/hostname` and `/ip` */
export const qnameEntrySchema = z.object({
  qname: z.string(),
  records: z.array(z.unknown()).optional(),
});

/** `/email_domain` and `/email_address` */
export const emailDomainEntrySchema = z.object({
  d: z.string(),
});

/** `/ns2domain` */
export const nsDomainEntrySchema = z.object({
  domain: z.string(),
});

/** `/domain2whois`: only the registrant email is read */
export const whoisEntrySchema = z.object({
  response: z.object({
    x: z.object({
      owner: z.string().min(1),
    }),
  }),
});

export type DnsRecord = z.infer<typeof dnsRecordSchema>;
export type QnameEntry = z.infer<typeof qnameEntrySchema>;
export type EmailDomainEntry = z.infer<typeof emailDomainEntrySchema>;
export type NsDomainEntry = z.infer<typeof nsDomainEntrySchema>;
export type WhoisEntry = z.infer<typeof whoisEntrySchema>;

export function hasResultList(data: unknown): boolean {
  return resultsEnvelopeSchema.safeParse(data).success;
}

/**
 * Entries of `data.results` that match `schema`, in order
 */
export function decodeEntries<T extends z.ZodTypeAny>(data: unknown, schema: T): z.infer<T>[] {
  const envelope = resultsEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    return [];
  }
  return decodeList(envelope.data.results, schema);
}

export function decodeList<T extends z.ZodTypeAny>(items: unknown[], schema: T): z.infer<T>[] {
  const decoded: z.infer<T>[] = [];
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      decoded.push(parsed.data);
    }
  }
  return decoded;
}
