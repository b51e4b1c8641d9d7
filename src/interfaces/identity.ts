import { z } from 'zod';

/** Claims the identity provider hands back for a signed-in user. */
export const IdentitySchema = z.object({
    subject: z.string().min(1),
    name: z.string().min(1),
    email: z.string().email(),
});

export type Identity = z.infer<typeof IdentitySchema>;
