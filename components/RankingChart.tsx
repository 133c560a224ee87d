import React from 'react';
import { BarChart, Bar, Cell, LabelList, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import { RankingView } from '../types';
import { interpolateColor } from '../services/ranking';

interface RankingChartProps {
  view: RankingView;
}

// Horizontal bars, first bar of the view on top
const RankingChart: React.FC<RankingChartProps> = ({ view }) => {
  const { bars, key, scale } = view;
  const values = bars.map(b => b.value);
  const min = values.length > 0 ? Math.min(...values) : 0;
  const max = values.length > 0 ? Math.max(...values) : 0;

  return (
    <div className="bg-white rounded-lg shadow p-6">
      <div className="h-[450px]">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={bars} layout="vertical" margin={{ left: 40, right: 20, top: 20, bottom: 40 }}>
            <CartesianGrid strokeDasharray="3 3" horizontal={false} />
            <XAxis
              type="number"
              dataKey="value"
              label={{ value: key.metric, position: 'insideBottom', offset: -10 }}
            />
            <YAxis type="category" dataKey="location" width={140} />
            <Tooltip formatter={(v) => (typeof v === 'number' ? v.toFixed(2) : String(v))} />
            <Bar dataKey="value" isAnimationActive={false}>
              {bars.map(b => (
                <Cell key={b.location} fill={b.fill} />
              ))}
              <LabelList dataKey="label" position="insideLeft" fill="#FFFFFF" />
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </div>

      {/* Color bar */}
      <div className="mt-4 flex items-center space-x-3 text-xs text-slate-500">
        <span>{key.metric}</span>
        <div
          className="flex-1 h-3 rounded"
          style={{ background: `linear-gradient(to right, ${interpolateColor(scale, 0)}, ${interpolateColor(scale, 1)})` }}
        />
        <span className="font-mono">
          {key.direction === 'low' ? `${max.toFixed(2)} → ${min.toFixed(2)}` : `${min.toFixed(2)} → ${max.toFixed(2)}`}
        </span>
      </div>
    </div>
  );
};

export default RankingChart;
