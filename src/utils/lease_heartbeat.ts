/**
 * Lease Heartbeat
 * Periodically extends a lease held by this process until stopped
 */

import { getLogger } from "@config/logging.ts";
import { ErrorUtils } from "@utils/error_catalog.ts";

const logger = getLogger("lease");

export interface LeaseHeartbeat {
  stop(): void;
}

/**
 * Call `renew` every `intervalMs`. A `false` reply means the lease changed hands and stops the heartbeat.
 */
export function startLeaseHeartbeat(
  name: string,
  renew: () => Promise<boolean>,
  intervalMs: number,
): LeaseHeartbeat {
  let stopped = false;
  let inFlight = false;

  const beat = async () => {
    if (stopped || inFlight) {
      return;
    }
    inFlight = true;
    try {
      if (!(await renew())) {
        logger.warn(`Lease ${name} is no longer held, stopping renewal`);
        stop();
      }
    } catch (error) {
      // Next beat retries; the lease still covers at least two more intervals
      logger.error(`Failed to renew lease ${name}`, { error: ErrorUtils.getMessage(error) });
    } finally {
      inFlight = false;
    }
  };

  const timer = setInterval(() => void beat(), Math.max(1, Math.floor(intervalMs)));

  function stop(): void {
    stopped = true;
    clearInterval(timer);
  }

  return { stop };
}
