import type { StageDescriptor } from '../types.js';
import { imageBuildStage, imageScanStage } from './build.js';
import { dastDeployStage, dastScanStage } from './dast.js';
import { notifyStage, publishStage, reportStage, type ReportingServices } from './reporting.js';
import { dependencyScanStage, sastStage, setupStage, unitTestStage } from './scans.js';

export type { ReportingServices } from './reporting.js';

/**
 * The DevSecOps stage table, in execution order. The report stage always runs
 * after every test and scan stage and before publish and notify.
 */
export function createDevSecOpsPipeline(services: ReportingServices = {}): StageDescriptor[] {
  return [
    setupStage,
    sastStage,
    dependencyScanStage,
    unitTestStage,
    imageBuildStage,
    imageScanStage,
    dastDeployStage,
    dastScanStage,
    reportStage(services),
    publishStage(services),
    notifyStage(services),
  ];
}
