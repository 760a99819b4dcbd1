import { z } from "zod";

export const itemNameSchema = z.string().trim().min(1);

export const quantityBodySchema = z.object({
  quantity: z.number().int(),
});

export const lowQuerySchema = z.object({
  threshold: z.coerce.number().int().optional(),
});

export const commandBodySchema = z.object({
  text: z.string().min(1),
});
