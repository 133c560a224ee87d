import React, { useState } from 'react';
import {
  LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer,
} from 'recharts';
import { Maximize2, TrendingUp, X } from 'lucide-react';
import { PriceSeries } from '../types';

interface PriceEvolutionChartProps {
  title: string;
  series: PriceSeries[];
  averageSeries: PriceSeries[];
}

const COLORS = ['#3B82F6', '#EF4444', '#10B981', '#F59E0B', '#8B5CF6', '#EC4899', '#14B8A6', '#64748B'];

const formatTimestamp = (ts: number): string => {
  const d = new Date(ts);
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}-${String(d.getUTCDate()).padStart(2, '0')} ${String(d.getUTCHours()).padStart(2, '0')}:${String(d.getUTCMinutes()).padStart(2, '0')}`;
};

const PriceEvolutionChart: React.FC<PriceEvolutionChartProps> = ({ title, series, averageSeries }) => {
  const [zoomed, setZoomed] = useState(false);

  const renderChart = () => (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart>
        <CartesianGrid strokeDasharray="3 3" vertical={false} />
        <XAxis
          dataKey="timestamp"
          type="number"
          domain={['dataMin', 'dataMax']}
          tickFormatter={(ts: number) => formatTimestamp(ts).substring(5, 10)}
          stroke="#64748B"
          allowDuplicatedCategory={false}
        />
        <YAxis label={{ value: 'Price ($/MWh)', angle: -90, position: 'insideLeft' }} />
        <Tooltip
          labelFormatter={(ts) => (typeof ts === 'number' ? formatTimestamp(ts) : String(ts))}
          contentStyle={{ borderRadius: '8px' }}
        />
        <Legend />
        {series.map((s, i) => (
          <Line
            key={s.name}
            data={s.points}
            dataKey="price"
            name={s.name}
            stroke={COLORS[i % COLORS.length]}
            strokeWidth={2}
            dot={{ r: 2 }}
            isAnimationActive={false}
          />
        ))}
        {averageSeries.map((s, i) => (
          <Line
            key={s.name}
            data={s.points}
            dataKey="price"
            name={s.name}
            stroke={COLORS[(series.length + i) % COLORS.length]}
            strokeWidth={3}
            strokeDasharray="4 4"
            dot={false}
            isAnimationActive={false}
          />
        ))}
      </LineChart>
    </ResponsiveContainer>
  );

  const empty = series.length === 0 && averageSeries.length === 0;

  return (
    <div className="bg-white rounded-lg shadow p-6">
      <div className="flex items-center justify-between mb-4">
        <h3 className="text-lg font-bold text-slate-800 flex items-center">
          <TrendingUp className="w-5 h-5 mr-2 text-blue-600" />
          {title}
        </h3>
        {!empty && (
          <button onClick={() => setZoomed(true)} className="p-2 hover:bg-slate-100 rounded-full transition" title="Enlarge">
            <Maximize2 className="w-4 h-4 text-slate-500" />
          </button>
        )}
      </div>
      <div className="h-[600px]">
        {empty ? (
          <div className="h-full flex items-center justify-center text-slate-400 text-sm">
            Select at least one pricing location or include the average.
          </div>
        ) : renderChart()}
      </div>

      {zoomed && (
        <div className="fixed inset-0 z-50 flex items-center justify-center bg-slate-900/50 backdrop-blur-sm p-4 animate-fade-in">
          <div className="bg-white rounded-xl shadow-2xl w-full max-w-7xl h-[80vh] flex flex-col overflow-hidden">
            <div className="flex justify-between items-center p-4 border-b border-slate-100 bg-slate-50">
              <h3 className="text-xl font-bold text-slate-800">{title}</h3>
              <button onClick={() => setZoomed(false)} className="p-2 hover:bg-slate-200 rounded-full transition">
                <X className="w-6 h-6 text-slate-500" />
              </button>
            </div>
            <div className="flex-1 p-6 bg-white">{renderChart()}</div>
          </div>
        </div>
      )}
    </div>
  );
};

export default PriceEvolutionChart;
