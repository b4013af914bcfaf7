import { envFlag, envNumber } from "./env";

export type ServiceConfig = {
  port: number;
  bodyLimitMb: number;
  uploadLimitMb: number;
  maxConcurrent: number;
  maxQueued: number;
  promotionThreshold: number;
  verifyRoundTrip: boolean;
  debug: boolean;
};

export function loadServiceConfig(): ServiceConfig {
  return {
    port: Math.floor(envNumber("PORT", 8080, { min: 0, max: 65535 })),
    bodyLimitMb: envNumber("MAX_BODY_MB", 4, { min: 1, max: 64 }),
    uploadLimitMb: envNumber("MAX_UPLOAD_MB", 4, { min: 1, max: 64 }),
    maxConcurrent: Math.floor(envNumber("ALIGN_MAX_CONCURRENT", 2, { min: 1, max: 64 })),
    maxQueued: Math.floor(envNumber("ALIGN_MAX_QUEUED", 16, { min: 0, max: 1024 })),
    promotionThreshold: envNumber("ALIGN_PROMOTION_THRESHOLD", 0.5, { min: -1, max: 1 }),
    verifyRoundTrip: envFlag("ALIGN_VERIFY_ROUND_TRIP", true),
    debug: envFlag("ALIGN_DEBUG")
  };
}
