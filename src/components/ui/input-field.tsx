/**
 * Labeled input row: label left, input right.
 */
export function InputField({ label, value, onChange, type = 'text', disabled }: {
  label: string;
  value: string | number;
  onChange: (v: string) => void;
  type?: 'text' | 'color' | 'number';
  disabled?: boolean;
}) {
  return (
    <div className="flex items-center justify-between gap-4 mb-1">
      <label className="text-sm font-medium text-slate-400 shrink-0">
        {label}
      </label>
      <input type={type} value={value} disabled={disabled}
        onChange={(e) => onChange(e.target.value)}
        className="w-[58%] h-9 px-3 text-sm border border-slate-600 rounded-lg bg-slate-800 text-foreground focus:outline-none focus:ring-2 focus:ring-primary/20 disabled:opacity-50" />
    </div>
  );
}
