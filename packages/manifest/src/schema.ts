/**
 * Zod schemas for integration manifests and built-in discovery tables.
 */

import { INTEGRATION_TYPES, type IntegrationType } from "@hearth/core";
import { z } from "zod";

/** Domains are lowercase identifiers; dots would collide with package paths. */
const DOMAIN_PATTERN = /^[a-z0-9_]+$/;

const DomainSchema = z
  .string()
  .min(1)
  .regex(DOMAIN_PATTERN, "Domain must contain only lowercase letters, digits and underscores");

const StringMapSchema = z.record(z.string(), z.string());

export const IntegrationTypeSchema = z.custom<IntegrationType>(
  (value) => typeof value === "string" && INTEGRATION_TYPES.some((t) => t === value),
  { message: `Must be one of: ${INTEGRATION_TYPES.join(", ")}` },
);

export const ZeroconfEntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      type: z.string().min(1),
      properties: StringMapSchema.optional(),
    })
    .passthrough(),
]);

export const BluetoothEntrySchema = z
  .object({
    local_name: z.string().optional(),
    service_uuid: z.string().optional(),
    service_data_uuid: z.string().optional(),
    manufacturer_id: z.number().int().optional(),
    manufacturer_data_start: z.array(z.number().int()).optional(),
    connectable: z.boolean().optional(),
  })
  .strict();

export const DhcpEntrySchema = z
  .object({
    macaddress: z.string().optional(),
    hostname: z.string().optional(),
    registered_devices: z.boolean().optional(),
  })
  .strict();

export const UsbEntrySchema = z
  .object({
    vid: z.string().optional(),
    pid: z.string().optional(),
    serial_number: z.string().optional(),
    manufacturer: z.string().optional(),
    description: z.string().optional(),
    known_devices: z.array(z.string()).optional(),
  })
  .strict();

export const HomekitEntrySchema = z.object({
  models: z.array(z.string().min(1)).optional(),
});

/**
 * manifest.json. Unknown keys are kept so hosts can read fields this
 * package does not model. A missing display name falls back to the domain.
 * Dependency ids are not checked here; a bad id fails dependency resolution.
 */
export const IntegrationManifestSchema = z
  .object({
    domain: DomainSchema,
    name: z.string().min(1).optional(),
    disabled: z.string().optional(),
    integration_type: IntegrationTypeSchema.optional(),
    dependencies: z.array(z.string()).optional(),
    after_dependencies: z.array(z.string()).optional(),
    requirements: z.array(z.string()).optional(),
    config_flow: z.boolean().optional(),
    documentation: z.string().optional(),
    issue_tracker: z.string().optional(),
    quality_scale: z.string().optional(),
    iot_class: z.string().optional(),
    codeowners: z.array(z.string()).optional(),
    loggers: z.array(z.string()).optional(),
    supported_brands: StringMapSchema.optional(),
    version: z.string().min(1).optional(),
    zeroconf: z.array(ZeroconfEntrySchema).optional(),
    ssdp: z.array(StringMapSchema).optional(),
    bluetooth: z.array(BluetoothEntrySchema).optional(),
    dhcp: z.array(DhcpEntrySchema).optional(),
    usb: z.array(UsbEntrySchema).optional(),
    homekit: HomekitEntrySchema.optional(),
    mqtt: z.array(z.string().min(1)).optional(),
  })
  .passthrough()
  .transform((manifest) => ({ ...manifest, name: manifest.name ?? manifest.domain }));

/**
 * Built-in discovery tables file. Every table defaults to empty so hosts
 * only ship the protocols they support.
 */
export const BuiltinDiscoveryTablesSchema = z.object({
  zeroconf: z
    .record(
      z.string(),
      z.array(
        z.object({ domain: DomainSchema, properties: StringMapSchema.optional() }).passthrough(),
      ),
    )
    .default({}),
  homekit: z.record(z.string(), DomainSchema).default({}),
  ssdp: z.record(z.string(), z.array(StringMapSchema)).default({}),
  bluetooth: z.array(BluetoothEntrySchema.extend({ domain: DomainSchema })).default([]),
  dhcp: z.array(DhcpEntrySchema.extend({ domain: DomainSchema })).default([]),
  usb: z
    .array(UsbEntrySchema.omit({ known_devices: true }).extend({ domain: DomainSchema }))
    .default([]),
  mqtt: z.record(z.string(), z.array(z.string())).default({}),
  configFlows: z
    .object({
      integration: z.array(DomainSchema).default([]),
      helper: z.array(DomainSchema).default([]),
    })
    .default({}),
  applicationCredentials: z.array(DomainSchema).default([]),
});
