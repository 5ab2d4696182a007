/**
 * manifest.json fixture strings for manifest tests.
 */

export const VALID_MINIMAL_JSON = JSON.stringify({
  domain: "acme_lights",
  name: "Acme Lights",
});

export const VALID_FULL_JSON = JSON.stringify({
  domain: "acme_hub",
  name: "Acme Hub",
  integration_type: "hardware",
  version: "2024.1.0",
  dependencies: ["network", "http"],
  after_dependencies: ["cloud"],
  requirements: ["acme-client==1.2.3"],
  config_flow: true,
  documentation: "https://example.invalid/acme_hub",
  codeowners: ["@someone"],
  zeroconf: ["_acme._tcp.local.", { type: "_hub._tcp.local.", macaddress: "AA:BB*" }],
  ssdp: [{ manufacturer: "Acme" }],
  bluetooth: [{ local_name: "Acme*", connectable: true }],
  dhcp: [{ hostname: "acme-*", macaddress: "001122*" }],
  usb: [{ vid: "10C4", pid: "EA60", known_devices: ["Acme Stick"] }],
  homekit: { models: ["AcmeBridge"] },
  mqtt: ["acme/+/state"],
  custom_key: { kept: true },
});

export const INVALID_JSON_SYNTAX = '{ "domain": "acme", ';

export const MISSING_DOMAIN_JSON = JSON.stringify({ name: "No Domain" });

export const BAD_TYPE_JSON = JSON.stringify({
  domain: "acme",
  name: "Acme",
  integration_type: "gadget",
});
