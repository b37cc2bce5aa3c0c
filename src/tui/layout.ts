export const HORIZONTAL_PADDING = 1;
export const HELP_MAX_LINES = 3;
/** Border rows of a pane (top + bottom). */
export const PANE_CHROME_ROWS = 2;

export interface ScreenLayout {
  innerWidth: number;
  mainHeight: number;
  listWidth: number;
  previewWidth: number;
  /** Visible note rows in the list pane. */
  listRows: number;
  statusRows: number;
  footerRows: number;
}

export function getFooterHeight(options: { helpLines: number }): number {
  return Math.max(1, Math.min(options.helpLines, HELP_MAX_LINES));
}

export function computeLayout(options: {
  width: number;
  height: number;
  splitRatio: number;
  hasStatus: boolean;
  helpLines: number;
}): ScreenLayout {
  const innerWidth = Math.max(0, options.width - HORIZONTAL_PADDING * 2);
  const footerRows = getFooterHeight({ helpLines: options.helpLines });
  const statusRows = options.hasStatus ? 1 : 0;
  const mainHeight = Math.max(0, options.height - footerRows - statusRows);
  const listWidth = Math.floor(innerWidth * options.splitRatio);
  return {
    innerWidth,
    mainHeight,
    listWidth,
    previewWidth: innerWidth - listWidth,
    listRows: Math.max(0, mainHeight - PANE_CHROME_ROWS),
    statusRows,
    footerRows,
  };
}
