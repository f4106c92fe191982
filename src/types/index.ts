import { z } from "zod";

export const itemInputSchema = z.object({
  name: z.string().min(1),
  daysToSell: z.number().int().safe(),
  quality: z.number().int().safe()
});

export const inventoryFileSchema = z.array(itemInputSchema);

export type ItemInput = z.infer<typeof itemInputSchema>;

export type ItemSnapshot = {
  name: string;
  daysToSell: number;
  quality: number;
};

export type DayReport = {
  day: number;
  items: ItemSnapshot[];
};
