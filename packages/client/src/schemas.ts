import { z } from 'zod'

export const LatencyReportSchema = z
  .record(z.number().finite())
  .refine((report) => 'latency' in report, { message: 'Latency report must contain latency' })

export const ErrorBodySchema = z.object({
  code: z.string(),
  message: z.string(),
})
