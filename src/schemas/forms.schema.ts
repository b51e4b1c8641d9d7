import { z } from 'zod';

export const LoginFormSchema = z.object({
  email: z.string({ required_error: 'Email is required.' }).trim().min(1, 'Email is required.').email('Enter a valid email address.'),
  password: z.string({ required_error: 'Password is required.' }).min(1, 'Password is required.'),
});

export const RegisterFormSchema = z.object({
  username: z.string({ required_error: 'Name is required.' }).trim().min(1, 'Name is required.').max(250, 'Name is too long.'),
  email: z
    .string({ required_error: 'Email is required.' })
    .trim()
    .min(1, 'Email is required.')
    .max(250, 'Email is too long.')
    .email('Enter a valid email address.'),
  password: z.string({ required_error: 'Password is required.' }).min(8, 'Password must be at least 8 characters.'),
});

export const AddCityFormSchema = z.object({
  city_name: z.string({ required_error: 'You must enter a city name.' }).trim().min(1, 'You must enter a city name.').max(200, 'City name is too long.'),
});

/** First message per field, in field order. */
export function formErrors(error: z.ZodError): string[] {
  const seen = new Set<string>();
  const messages: string[] = [];

  for (const issue of error.issues) {
    const field = issue.path.join('.');
    if (seen.has(field)) continue;
    seen.add(field);
    messages.push(issue.message);
  }

  return messages;
}
