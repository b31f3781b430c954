/**
 * Process exit codes for argo-chart-bump
 *
 * Fine-grained exit codes allow pipelines to distinguish
 * between different failure modes. Git failures exit with
 * git's own status; EXIT_GIT_OPERATION_FAILED is used only
 * when git never produced one.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_RESOLUTION_FAILED = 3;
export const EXIT_DATA_ERROR = 4;
export const EXIT_GIT_OPERATION_FAILED = 5;
