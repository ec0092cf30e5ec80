import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";

export const HARVEST_TASK = "Harvest";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Harvest Progress ",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

/**
 * Add the per-item harvest task (Green)
 */
export function addHarvestProgressTask(totalItems: number, taskName = HARVEST_TASK): void {
  const bars = initProgressBars();
  bars.addTask(taskName, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: `0/${totalItems} items`,
  });
}

/**
 * Update harvest progress
 */
export function updateHarvestProgress(
  done: number,
  totalItems: number,
  taskName = HARVEST_TASK,
): void {
  if (!mpb) return;
  const percentage = totalItems > 0 ? done / totalItems : 1;
  mpb.updateTask(taskName, {
    percentage,
    message: `${done}/${totalItems} items`,
  });
}

/**
 * Mark a task as done
 */
export function markTaskDone(
  message?: string,
  colorFn?: (text: string) => string,
  taskName = HARVEST_TASK,
): void {
  if (!mpb) return;
  mpb.done(taskName, {
    message: message || "Complete",
    barTransformFn: colorFn || chalk.gray,
  });
}
