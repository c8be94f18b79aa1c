/**
 * Centralized constants for the config sync client.
 */

import type { ApiFamily } from "@/lib/types";

export const EXTENSION_API_ID = "extension";

// Authorization scheme expected by the config API
export const AUTH_SCHEME = "Api-Token";

// Transport defaults
export const HTTP_DEFAULTS = {
  TIMEOUT_MS: 30_000,
  RETRIES: 0,
  RETRY_DELAY_MS: 500,
} as const;

// Keys under which list endpoints wrap their items
export const LIST_ENVELOPE_KEYS = [
  "values",
  "dashboards",
  "extensions",
  "locations",
  "monitors",
] as const;

export interface ApiCatalogEntry {
  id: string;
  urlPath: string;
  family?: ApiFamily;
}

// Configuration API families of the platform
export const API_CATALOG: readonly ApiCatalogEntry[] = [
  { id: "alerting-profile", urlPath: "/api/config/v1/alertingProfiles" },
  { id: "management-zone", urlPath: "/api/config/v1/managementZones" },
  { id: "auto-tag", urlPath: "/api/config/v1/autoTags" },
  { id: "dashboard", urlPath: "/api/config/v1/dashboards" },
  { id: "notification", urlPath: "/api/config/v1/notifications" },
  { id: EXTENSION_API_ID, urlPath: "/api/config/v1/extensions", family: "extension" },
  { id: "custom-service-java", urlPath: "/api/config/v1/service/customServices/java" },
  { id: "anomaly-detection-metrics", urlPath: "/api/config/v1/anomalyDetection/metricEvents" },
  { id: "synthetic-location", urlPath: "/api/v1/synthetic/locations" },
  { id: "synthetic-monitor", urlPath: "/api/v1/synthetic/monitors" },
  { id: "application", urlPath: "/api/config/v1/applications/web" },
  { id: "app-detection-rule", urlPath: "/api/config/v1/applicationDetectionRules" },
  { id: "aws-credentials", urlPath: "/api/config/v1/aws/credentials" },
  { id: "kubernetes-credentials", urlPath: "/api/config/v1/kubernetes/credentials" },
  { id: "azure-credentials", urlPath: "/api/config/v1/azure/credentials" },
  { id: "request-attributes", urlPath: "/api/config/v1/service/requestAttributes" },
  { id: "calculated-metrics-service", urlPath: "/api/config/v1/calculatedMetrics/service" },
  { id: "conditional-naming-processgroup", urlPath: "/api/config/v1/conditionalNaming/processGroup" },
  { id: "conditional-naming-host", urlPath: "/api/config/v1/conditionalNaming/host" },
  { id: "conditional-naming-service", urlPath: "/api/config/v1/conditionalNaming/service" },
  { id: "maintenance-window", urlPath: "/api/config/v1/maintenanceWindows" },
  { id: "request-naming-service", urlPath: "/api/config/v1/service/requestNaming" },
  { id: "reports", urlPath: "/api/config/v1/reports" },
];
