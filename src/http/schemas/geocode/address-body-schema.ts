import z from 'zod'

const optionalText = z.string().trim().max(500).optional()

export const addressBodySchema = z
  .object({
    name: optionalText,
    street_address: optionalText,
    settlement: optionalText,
    region: optionalText,
  })
  .refine((body) => Boolean(body.street_address) || Boolean(body.settlement) || Boolean(body.region), {
    message: 'Provide at least street_address, settlement or region',
  })

export type AddressBodySchema = z.infer<typeof addressBodySchema>
