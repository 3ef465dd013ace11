/**
 * Service catalog: per-integration prompt text selected by `selected_service`.
 *
 * Plain configuration data kept in services.json and validated once at load.
 * The memory pipeline only ever sees the resolved instructions string.
 */
import { z } from "zod";

import catalogData from "./services.json";

const ServiceItemSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  description: z.string(),
  instructions: z.string().min(1),
});

const ServiceCatalogSchema = z.object({
  categories: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      items: z.array(ServiceItemSchema),
    })
  ),
});

export type ServiceItem = z.infer<typeof ServiceItemSchema>;
export type ServiceCatalog = z.infer<typeof ServiceCatalogSchema>;

export const serviceCatalog: ServiceCatalog =
  ServiceCatalogSchema.parse(catalogData);

export function findService(
  serviceId: string | null | undefined,
  catalog: ServiceCatalog = serviceCatalog
): ServiceItem | null {
  if (!serviceId) {
    return null;
  }

  for (const category of catalog.categories) {
    const item = category.items.find((candidate) => candidate.id === serviceId);
    if (item) {
      return item;
    }
  }

  return null;
}
