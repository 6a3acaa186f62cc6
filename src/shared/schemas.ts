import { z } from 'zod';

const toggles = z
  .object({
    sast: z.boolean().default(true),
    dependencyScan: z.boolean().default(true),
    envSetup: z.boolean().default(true),
    unitTests: z.boolean().default(true),
    imageBuild: z.boolean().default(true),
    dastDeploy: z.boolean().default(true),
    dastScan: z.boolean().default(true),
    publishReport: z.boolean().default(true),
    notify: z.boolean().default(true),
  })
  .default({});

const project = z
  .object({
    root: z.string().default('.'),
    sourceDir: z.string().default('app'),
    testsDir: z.string().default('tests'),
    requirements: z.string().default('requirements.txt'),
    dockerfile: z.string().default('Dockerfile'),
    reportDir: z.string().default('report'),
    versionFile: z.string().optional(),
    stateDir: z.string().default('.secpipe'),
  })
  .default({});

const tools = z
  .object({
    python: z.string().default('python3'),
    docker: z.string().default('docker'),
    bandit: z.string().default('bandit'),
    safety: z.string().default('safety'),
    pytest: z.string().default('pytest'),
    trivy: z.string().default('trivy'),
  })
  .default({});

const image = z
  .object({
    tag: z.string().default('secure-flask-app:latest'),
  })
  .default({});

const dast = z
  .object({
    network: z.string().default('secpipe-dast-net'),
    container: z.string().default('secpipe-dast-target'),
    port: z.number().int().positive().default(5000),
    healthPath: z.string().nullable().default('/health'),
    readinessTimeoutMs: z.number().int().positive().default(60_000),
    pollIntervalMs: z.number().int().positive().default(2_000),
    fixedDelayMs: z.number().int().nonnegative().default(15_000),
    zapImage: z.string().default('ghcr.io/zaproxy/zaproxy:stable'),
  })
  .default({});

const timeouts = z
  .object({
    defaultMs: z.number().int().positive().default(15 * 60_000),
    stages: z.record(z.string(), z.number().int().positive()).default({}),
  })
  .default({});

const report = z
  .object({
    basename: z.string().default('test_result_report'),
    title: z.string().default('DevSecOps Test & Security Report'),
  })
  .default({});

const confluence = z
  .object({
    baseUrl: z.string().default(''),
    user: z.string().default(''),
    token: z.string().default(''),
    spaceKey: z.string().default('DEMO'),
    titlePrefix: z.string().default('Test Result Report'),
  })
  .default({});

const smtp = z
  .object({
    host: z.string().default(''),
    port: z.number().int().positive().default(587),
    user: z.string().default(''),
    pass: z.string().default(''),
    from: z.string().default(''),
    to: z.array(z.string()).default([]),
  })
  .default({});

export const PipelineConfigSchema = z.object({
  toggles,
  project,
  tools,
  image,
  dast,
  timeouts,
  report,
  confluence,
  smtp,
});

export const ContentSearchResponseSchema = z.object({
  results: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      version: z.object({ number: z.number() }).optional(),
    }),
  ),
  size: z.number().optional(),
});

export const ContentCreatedSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
});
