import { CartesianGrid, Line, LineChart, XAxis, YAxis } from 'recharts';

export interface ChartPoint {
  time: number;       // epoch milliseconds
  value: number;
}

export interface ChartSeries {
  symbol: string;
  color: string;
  points: ChartPoint[];
}

export interface PortfolioChartProps {
  series: ChartSeries[];
  width: number;
  height: number;
}

const formatDateTick = (time: number) => new Date(time).toISOString().slice(0, 10);

const formatValueTick = (value: number) => {
  if (value >= 1000000) return `$${(value / 1000000).toFixed(1)}M`;
  if (value >= 1000) return `$${(value / 1000).toFixed(0)}K`;
  return `$${value}`;
};

// One line per symbol on a shared time axis. Animation is off because the
// chart is rendered once to static markup.
export function PortfolioChart({ series, width, height }: PortfolioChartProps) {
  return (
    <LineChart width={width} height={height} margin={{ top: 10, right: 30, left: 20, bottom: 10 }}>
      <CartesianGrid strokeDasharray="3 3" stroke="#d0d0d0" />
      <XAxis
        dataKey="time"
        type="number"
        scale="time"
        domain={['dataMin', 'dataMax']}
        tickFormatter={formatDateTick}
      />
      <YAxis tickFormatter={formatValueTick} />
      {series.map((s) => (
        <Line
          key={s.symbol}
          data={s.points}
          dataKey="value"
          name={s.symbol}
          stroke={s.color}
          strokeWidth={2}
          dot={false}
          isAnimationActive={false}
        />
      ))}
    </LineChart>
  );
}
