import { z } from "zod"

const numberish = z.union([z.string(), z.number()]).optional()

/** Legacy `vmess://base64(json)` payload. Unknown keys are ignored. */
export const legacyVmessSchema = z.object({
  v: numberish,
  ps: z.string().optional(),
  add: z.string().min(1),
  port: numberish,
  id: z.string().min(1),
  aid: numberish,
  scy: z.string().optional(),
  net: z.string().optional(),
  type: z.string().optional(),
  host: z.string().optional(),
  path: z.string().optional(),
  tls: z.string().optional(),
  sni: z.string().optional(),
  alpn: z.string().optional(),
  fp: z.string().optional(),
  allowInsecure: z.union([z.boolean(), z.string(), z.number()]).optional()
})

export type LegacyVmess = z.infer<typeof legacyVmessSchema>
