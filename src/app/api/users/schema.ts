import { z } from 'zod'

const nameField = z.string().trim().max(100).nullable().optional()

export const userInputSchema = z.object({
  first_name: nameField,
  last_name: nameField,
})
