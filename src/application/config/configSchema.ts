import { z } from 'zod';
import { parseMacAddress } from '@/shared/utils/mac';
import { parseHostPort } from '@/shared/utils/net';

const addressSchema = z.string().transform((value, ctx) => {
  const parsed = parseHostPort(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected "host:port"' });
    return z.NEVER;
  }
  return parsed;
});

const macSchema = z.string().transform((value, ctx) => {
  const mac = parseMacAddress(value);
  if (!mac) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a 6-byte hex MAC address' });
    return z.NEVER;
  }
  return mac;
});

const devtypeSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const text = String(value).trim();
  const parsed = /^0x[0-9a-f]+$/i.test(text)
    ? Number.parseInt(text.slice(2), 16)
    : /^\d+$/.test(text)
      ? Number.parseInt(text, 10)
      : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 0xffff) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'expected a device type between 0 and 0xffff',
    });
    return z.NEVER;
  }
  return parsed;
});

const speakerSchema = z.object({
  address: addressSchema,
  mac: macSchema,
  devtype: devtypeSchema,
});

export const daemonConfigSchema = z.object({
  receiver: z.object({
    name: z.string().trim().min(1, 'receiver name must not be empty'),
  }),
  speakers: z
    .record(speakerSchema)
    .refine((speakers) => Object.keys(speakers).length > 0, {
      message: 'at least one speaker is required',
    }),
  timing: z
    .object({
      pollIntervalMs: z.number().int().positive().optional(),
      gracePeriodMs: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export type ParsedDaemonConfig = z.output<typeof daemonConfigSchema>;
