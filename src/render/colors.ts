// Chart palette (matches the common default plotting colours)

export const CHART_COLORS = {
  background: '#ffffff',
  frame: '#000000',
  grid: '#b0b0b0',
  text: '#000000',
  mutedText: '#777777',
  series: '#1f77b4',
  legendBorder: '#cccccc',
} as const;
