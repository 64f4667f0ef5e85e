import type { CategoryTotal } from '../utils/logReport'

const BAR_COLORS = ['#5ebf9e', '#7b9dd4', '#e8b86d', '#d9756d', '#b08ed9', '#6dc7d9', '#c9d96d', '#d98fb8']

interface BarChartProps {
  data: CategoryTotal[]
  valueLabel: string
  height?: number
}

export default function BarChart({ data, valueLabel, height = 200 }: BarChartProps) {
  if (data.length === 0) return null

  const max = Math.max(...data.map((d) => d.value), 1)
  const padding = { top: 18, right: 12, bottom: 32, left: 40 }
  const width = 520
  const chartWidth = width - padding.left - padding.right
  const chartHeight = height - padding.top - padding.bottom
  const slot = chartWidth / data.length
  const barWidth = Math.min(56, slot * 0.7)
  const baseline = padding.top + chartHeight

  return (
    <svg
      width="100%"
      viewBox={`0 0 ${width} ${height}`}
      preserveAspectRatio="xMidYMid meet"
      style={{ maxWidth: '100%', minWidth: 320 }}
      role="img"
      aria-label={`Bar chart: ${valueLabel} by category`}
    >
      <line
        x1={padding.left}
        y1={baseline}
        x2={padding.left + chartWidth}
        y2={baseline}
        stroke="var(--border)"
        strokeWidth="1"
      />
      <text x={padding.left - 8} y={padding.top + 4} textAnchor="end" fontSize="10" fill="var(--text-muted)">
        {Math.round(max)}
      </text>
      {data.map((d, i) => {
        const barHeight = (d.value / max) * chartHeight
        const x = padding.left + i * slot + (slot - barWidth) / 2
        return (
          <g key={d.label}>
            <rect
              x={x}
              y={baseline - barHeight}
              width={barWidth}
              height={barHeight}
              rx={3}
              fill={BAR_COLORS[i % BAR_COLORS.length]}
              aria-label={`${d.label}: ${d.value} ${valueLabel}`}
            />
            <text
              x={x + barWidth / 2}
              y={baseline - barHeight - 4}
              textAnchor="middle"
              fontSize="10"
              fill="var(--text)"
            >
              {d.value}
            </text>
            <text
              x={x + barWidth / 2}
              y={height - 10}
              textAnchor="middle"
              fontSize="10"
              fill="var(--text-muted)"
            >
              {d.label}
            </text>
          </g>
        )
      })}
    </svg>
  )
}
