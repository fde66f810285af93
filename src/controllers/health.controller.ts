import * as http from "http";
import { Logger } from "../logger";
import { Router } from "../router";

export interface HealthReport {
  status: "healthy";
  timestamp: string;
}

/** Liveness endpoint for load balancers and container orchestrators. */
export class HealthController {
  private logger: Logger;

  constructor(logger: Logger, router: Router) {
    this.logger = logger;
    router.get("/health", (_req, res, _params) => {
      // #swagger.tags = ['Health']
      // #swagger.summary = 'Liveness check'
      // #swagger.description = 'Answers 200 while the file drop server is accepting requests. Does not touch the upload directory.'
      /* #swagger.responses[200] = {
        description: 'Server is accepting requests',
        content: {
          'application/json': {
            schema: {
              type: 'object',
              properties: {
                status: { type: 'string', example: 'healthy' },
                timestamp: { type: 'string', format: 'date-time', example: '2024-01-01T00:00:00.000Z' }
              }
            }
          }
        }
      } */
      this.report(res);
    });
  }

  private report(res: http.ServerResponse): void {
    const body: HealthReport = {
      status: "healthy",
      timestamp: new Date().toISOString(),
    };
    this.logger.debug("Health check answered");
    res.writeHead(200, { "Content-Type": "application/json" });
    res.end(JSON.stringify(body));
  }
}
