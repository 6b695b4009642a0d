import { z } from "zod";

const credentialSchema = z.object({
  login: z.string().default(""),
  password: z.string().min(1),
});

export const credentialsFileSchema = z.object({
  hosts: z.record(z.string().min(1), credentialSchema),
});

export type Credential = z.infer<typeof credentialSchema>;
