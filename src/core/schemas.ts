import {z} from 'zod'

export const algorithmTypes = ['objectDetectionAOI', 'changeDetectionAOI'] as const
export const blockTypes = ['data', 'processing'] as const
export const machineTypes = ['small', 'medium', 'large', 'xlarge', 'gpu_nvidia_tesla_k80'] as const

export const manifestSpecificationVersion = 2

/** Scalars written unquoted in YAML (e.g. `tag: 1.0`) are accepted and read as strings. */
const nonEmptyString = z.union([z.string(), z.number()]).pipe(z.coerce.string().min(1))

/** `null` and a missing key both mean "not overridden". */
const optionalOverride = nonEmptyString.nullish().transform(value => value ?? undefined)

const mapping = z.record(z.unknown())

export const dockerInputSchema = z.object({
  base_image: nonEmptyString,
  exposed_port: z.union([z.number(), z.string()]).pipe(z.coerce.number().int().min(1).max(65_535)),
  type: z.enum(algorithmTypes),
  routes: z.object({
    healthcheck: nonEmptyString,
    process: nonEmptyString
  }),
  command: optionalOverride,
  resolution: z.union([z.number(), z.string()])
    .pipe(z.coerce.number().positive())
    .nullish()
    .transform(value => value ?? undefined)
})

export const dockerOutputSchema = z.object({
  tag: nonEmptyString,
  workdir: optionalOverride
})

export const dockerConfigSchema = z.object({
  input: dockerInputSchema,
  output: dockerOutputSchema
})

export const manifestConfigSchema = z.object({
  name: nonEmptyString,
  display_name: nonEmptyString,
  type: z.enum(blockTypes),
  tags: z.array(z.string()),
  description: z.string(),
  parameters: mapping,
  machine: z.enum(machineTypes),
  input_capabilities: mapping,
  output_capabilities: mapping
})

export const packagingConfigSchema = z.object({
  docker: dockerConfigSchema,
  manifest: manifestConfigSchema
})

/**
 * Versioned block manifest. Key order here is the key order of the
 * persisted `UP42Manifest.json`.
 */
export const manifestSchema = z.object({
  _up42_specification_version: z.literal(manifestSpecificationVersion),
  name: z.string().min(1),
  type: z.enum(blockTypes),
  tags: z.array(z.string()),
  display_name: z.string().min(1),
  description: z.string(),
  parameters: mapping,
  machine: z.object({
    type: z.enum(machineTypes)
  }),
  input_capabilities: mapping,
  output_capabilities: mapping
})

/** Body returned by the platform validation endpoint. */
export const validationResponseSchema = z.object({
  data: z.object({
    valid: z.boolean(),
    errors: z.array(z.unknown()).optional()
  })
})

/** Subset of `docker image inspect` output the packager reads. */
export const imageInspectSchema = z.object({
  Id: z.string(),
  Config: z.object({
    Cmd: z.union([z.array(z.string()), z.string()]).nullish(),
    Entrypoint: z.union([z.array(z.string()), z.string()]).nullish(),
    WorkingDir: z.string().optional()
  })
})

/** Formats a zod issue as `<dotted.path>: <message>`. */
export function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}
