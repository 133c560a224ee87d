import React, { useEffect, useRef, useState } from 'react';
import { Calendar, Check, ChevronDown, DollarSign, Filter, MapPin } from 'lucide-react';
import { DispatchType, MarketFilterState } from '../types';
import { DISPATCH_TYPES, labelFor } from '../config';

interface MarketFiltersProps {
  locations: string[];
  priceTypes: string[];
  filters: MarketFilterState;
  setFilters: (f: MarketFilterState) => void;
}

const toggle = <T,>(list: T[], item: T): T[] =>
  list.includes(item) ? list.filter(x => x !== item) : [...list, item];

const MarketFilters: React.FC<MarketFiltersProps> = ({ locations, priceTypes, filters, setFilters }) => {
  const [isLocationsOpen, setIsLocationsOpen] = useState(false);
  const locationsRef = useRef<HTMLDivElement>(null);

  // Handle outside click for dropdown
  useEffect(() => {
    function handleClickOutside(event: MouseEvent) {
      const target = event.target;
      if (locationsRef.current && target instanceof Node && !locationsRef.current.contains(target)) {
        setIsLocationsOpen(false);
      }
    }
    document.addEventListener('mousedown', handleClickOutside);
    return () => document.removeEventListener('mousedown', handleClickOutside);
  }, []);

  return (
    <div className="bg-white rounded-lg shadow p-6">
      <div className="flex items-center mb-4 pb-4 border-b border-slate-100">
        <Filter className="w-5 h-5 text-slate-500 mr-2" />
        <h2 className="text-lg font-bold text-slate-800">Filters</h2>
      </div>

      <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-4 gap-6">
        {/* Locations */}
        <div ref={locationsRef} className="relative">
          <label className="block text-sm font-medium text-slate-700 mb-2 flex items-center">
            <MapPin className="w-4 h-4 mr-1" />
            Pricing Location
          </label>
          <button
            type="button"
            className="w-full bg-white border border-gray-300 rounded-md shadow-sm pl-3 pr-10 py-2 text-left cursor-default sm:text-sm relative"
            onClick={() => setIsLocationsOpen(!isLocationsOpen)}
          >
            <span className="block truncate">
              {filters.locations.length === 0 ? 'Select locations...' : `${filters.locations.length} selected`}
            </span>
            <span className="absolute inset-y-0 right-0 flex items-center pr-2 pointer-events-none">
              <ChevronDown className="h-4 w-4 text-gray-400" />
            </span>
          </button>
          {isLocationsOpen && (
            <div className="absolute z-30 mt-1 w-full bg-white shadow-lg max-h-60 rounded-md py-1 text-base ring-1 ring-black ring-opacity-5 overflow-auto sm:text-sm">
              {locations.map(location => {
                const selected = filters.locations.includes(location);
                return (
                  <div
                    key={location}
                    className={`cursor-pointer select-none relative py-2 pl-3 pr-9 hover:bg-blue-50 ${selected ? 'text-blue-900 bg-blue-50' : 'text-gray-900'}`}
                    onClick={() => setFilters({ ...filters, locations: toggle(filters.locations, location) })}
                  >
                    <span className={`block truncate ${selected ? 'font-semibold' : 'font-normal'}`}>{location}</span>
                    {selected && (
                      <span className="absolute inset-y-0 right-0 flex items-center pr-4 text-blue-600">
                        <Check className="h-4 w-4" />
                      </span>
                    )}
                  </div>
                );
              })}
            </div>
          )}
        </div>

        {/* Date range */}
        <div>
          <label className="block text-sm font-medium text-slate-700 mb-2 flex items-center">
            <Calendar className="w-4 h-4 mr-1" />
            Date range
          </label>
          <div className="flex space-x-2">
            <input
              type="date"
              value={filters.dateRange.start}
              onChange={e => setFilters({ ...filters, dateRange: { ...filters.dateRange, start: e.target.value } })}
              className="w-1/2 border-slate-300 rounded-md shadow-sm p-2 border"
            />
            <input
              type="date"
              value={filters.dateRange.end}
              onChange={e => setFilters({ ...filters, dateRange: { ...filters.dateRange, end: e.target.value } })}
              className="w-1/2 border-slate-300 rounded-md shadow-sm p-2 border"
            />
          </div>
          <label className="flex items-center mt-2 text-sm text-slate-600">
            <input
              type="checkbox"
              checked={filters.includeAverage}
              onChange={e => setFilters({ ...filters, includeAverage: e.target.checked })}
              className="mr-2"
            />
            Include average across selected dates
          </label>
        </div>

        {/* Dispatch */}
        <div>
          <label className="block text-sm font-medium text-slate-700 mb-2">Dispatch type</label>
          <div className="space-y-1">
            {DISPATCH_TYPES.map((d: DispatchType) => (
              <label key={d} className="flex items-center text-sm text-slate-600">
                <input
                  type="checkbox"
                  checked={filters.dispatchTypes.includes(d)}
                  onChange={() => setFilters({ ...filters, dispatchTypes: toggle(filters.dispatchTypes, d) })}
                  className="mr-2"
                />
                {d.replace(/_/g, '-')}
              </label>
            ))}
          </div>
        </div>

        {/* Price type */}
        <div>
          <label className="block text-sm font-medium text-slate-700 mb-2 flex items-center">
            <DollarSign className="w-4 h-4 mr-1" />
            Price Type
          </label>
          <select
            value={filters.priceType}
            onChange={e => setFilters({ ...filters, priceType: e.target.value })}
            className="w-full border-slate-300 rounded-md shadow-sm p-2 border focus:ring-blue-500 focus:border-blue-500 bg-slate-50"
          >
            {priceTypes.map(p => (
              <option key={p} value={p}>{labelFor(p)}</option>
            ))}
          </select>
        </div>
      </div>
    </div>
  );
};

export default MarketFilters;
