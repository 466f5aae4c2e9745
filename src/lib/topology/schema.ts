import { constants } from 'node:os';
import { z } from 'zod';
import { MAX_TIMER_MS } from '../orchestrator/service-spec';

function isSignal(value: string): value is NodeJS.Signals {
  return Object.keys(constants.signals).includes(value);
}

const durationMS = z
  .number()
  .int()
  .nonnegative()
  .max(MAX_TIMER_MS, `Expected at most ${MAX_TIMER_MS}ms`);

const PORT_PATTERN = /^(\d+):(\d+)(?:\/(tcp|udp))?$/;

/**
 * `"17017:27017"`, `"5353:53/udp"` or `{ host, container, protocol? }`
 */
const portSchema = z
  .union([
    z.string(),
    z.object({
      host: z.number().int(),
      container: z.number().int(),
      protocol: z.enum(['tcp', 'udp']).default('tcp'),
    }),
  ])
  .transform((value, ctx) => {
    if (typeof value !== 'string') {
      return value;
    }

    const match = PORT_PATTERN.exec(value);

    if (match === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected "host:container" or "host:container/protocol"',
      });

      return z.NEVER;
    }

    const [, host = '', container = '', protocol = 'tcp'] = match;

    return {
      host: Number(host),
      container: Number(container),
      protocol: protocol === 'udp' ? ('udp' as const) : ('tcp' as const),
    };
  });

const VOLUME_PATTERN = /^([^:]+):([^:]+)(?::(ro|rw))?$/;

/**
 * `"fhir-store-data:/data/db"`, `"./init:/docker-entrypoint-initdb.d:ro"` or
 * `{ source, target, readOnly? }`
 */
const volumeSchema = z
  .union([
    z.string(),
    z.object({
      source: z.string().min(1),
      target: z.string().min(1),
      readOnly: z.boolean().default(false),
    }),
  ])
  .transform((value, ctx) => {
    if (typeof value !== 'string') {
      return value;
    }

    const match = VOLUME_PATTERN.exec(value);

    if (match === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected "source:target" or "source:target:ro"',
      });

      return z.NEVER;
    }

    const [, source = '', target = '', mode] = match;
    return { source, target, readOnly: mode === 'ro' };
  });

const TCP_TARGET_PATTERN = /^(.+):(\d+)$/;

const healthTimingSchema = z.object({
  intervalMS: durationMS.optional(),
  timeoutMS: durationMS.optional(),
  successThreshold: z.number().int().positive().optional(),
  failureThreshold: z.number().int().positive().optional(),
  startPeriodMS: durationMS.optional(),
});

/**
 * Timing plus at most one probe: `http: URL`, `tcp: "host:port"` or
 * `exec: [argv]`. Without a probe a service counts as healthy once running.
 */
const healthCheckSchema = healthTimingSchema
  .extend({
    http: z.string().url().optional(),
    tcp: z
      .string()
      .regex(TCP_TARGET_PATTERN, 'Expected "host:port"')
      .optional(),
    exec: z.array(z.string()).min(1).optional(),
  })
  .strict()
  .refine(
    (check) =>
      [check.http, check.tcp, check.exec].filter((probe) => probe !== undefined)
        .length <= 1,
    { message: 'Only one of http, tcp and exec can be set' },
  );

const backoffSchema = z
  .object({
    baseMS: durationMS,
    maxMS: durationMS,
    maxRetries: z.number().int().nonnegative(),
    resetAfterMS: durationMS,
  })
  .partial()
  .strict();

const restartSchema = z
  .object({
    policy: z.enum(['never', 'on-failure', 'always']).optional(),
    backoff: backoffSchema.optional(),
  })
  .strict();

const signalSchema = z
  .string()
  .refine(isSignal, { message: 'Expected a signal name such as SIGTERM' });

export const serviceSchema = z
  .object({
    image: z.string().min(1).optional(),
    args: z.array(z.string()).optional(),
    command: z.array(z.string()).min(1).optional(),
    workingDir: z.string().min(1).optional(),
    environment: z
      .record(z.union([z.string(), z.number(), z.boolean()]))
      .optional(),
    secretKeys: z.array(z.string()).optional(),
    ports: z.array(portSchema).optional(),
    volumes: z.array(volumeSchema).optional(),
    dependsOn: z.array(z.string()).optional(),
    healthCheck: healthCheckSchema.optional(),
    restart: restartSchema.optional(),
    stopTimeoutMS: durationMS.optional(),
    stopSignal: signalSchema.optional(),
    startupTimeoutMS: durationMS.optional(),
  })
  .strict()
  .superRefine((service, context) => {
    if ((service.image === undefined) === (service.command === undefined)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Set either image (a container) or command (a process)',
      });
      return;
    }

    if (service.image === undefined) {
      if (service.args !== undefined || service.volumes !== undefined) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'args and volumes only apply to image services',
        });
      }
    } else if (service.workingDir !== undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['workingDir'],
        message: 'workingDir only applies to command services',
      });
    }
  });

export const topologySchema = z
  .object({
    project: z.string().min(1).optional(),
    defaults: z
      .object({
        healthCheck: healthTimingSchema.strict().optional(),
        restart: restartSchema.optional(),
        stopTimeoutMS: durationMS.optional(),
        stopSignal: signalSchema.optional(),
        startupTimeoutMS: durationMS.optional(),
      })
      .strict()
      .optional(),
    services: z
      .record(serviceSchema)
      .refine((services) => Object.keys(services).length > 0, {
        message: 'At least one service is required',
      }),
  })
  .strict();

export type TopologyDocument = z.infer<typeof topologySchema>;
export type ServiceDocument = z.infer<typeof serviceSchema>;
export type HealthCheckDocument = z.infer<typeof healthCheckSchema>;

/**
 * `"127.0.0.1:27017"` -> `{ host: '127.0.0.1', port: 27017 }`
 */
export function parseTCPTarget(target: string): { host: string; port: number } {
  const [, host = '', port = ''] = TCP_TARGET_PATTERN.exec(target) ?? [];
  return { host, port: Number(port) };
}
