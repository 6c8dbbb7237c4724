import { Minus, Plus, Trash2 } from 'lucide-react';
import { useEditorStore } from '../../store/useEditorStore';
import { symbolFromEditable, symbolToEditable } from '../../model/elements';
import { formatHexColor, parseHexColor } from '../../utils/color';
import { InputField } from '../ui/input-field';

export default function PropertyPanel() {
  const element = useEditorStore(s => s.getActiveElement());
  const updateElement = useEditorStore(s => s.updateElement);
  const removeElement = useEditorStore(s => s.removeElement);

  if (!element) return null;
  const id = element.id;

  const setAuthor = (index: number, value: string) =>
    updateElement(id, { authors: element.authors.map((a, i) => (i === index ? value : a)) });

  return (
    <div className="absolute top-2 right-2 z-10 w-80 bg-card/95 border border-border rounded-lg p-3 shadow-sm">
      <div className="text-sm font-medium mb-2">Edit Element</div>
      <InputField label="Name" value={element.name} onChange={v => updateElement(id, { name: v })} />
      <InputField
        label="Symbol"
        value={symbolToEditable(element.symbol)}
        onChange={v => updateElement(id, { symbol: symbolFromEditable(v) })}
      />
      <InputField label="Pronouns" value={element.pronouns} onChange={v => updateElement(id, { pronouns: v })} />
      <InputField
        label="Embed Color"
        type="color"
        value={formatHexColor(element.embedColor).toLowerCase()}
        onChange={v => {
          const color = parseHexColor(v);
          if (color !== null) updateElement(id, { embedColor: color });
        }}
      />

      <div className="flex items-center justify-between gap-4 mb-1">
        <label className="text-sm font-medium shrink-0">
          <input
            type="checkbox"
            className="mr-2"
            checked={element.atomicNumber !== null}
            onChange={e => updateElement(id, { atomicNumber: e.target.checked ? 0 : null })}
          />
          Atomic Number
        </label>
        {element.atomicNumber !== null && (
          <input
            type="number"
            step={1}
            value={element.atomicNumber}
            onChange={e => {
              const n = parseInt(e.target.value, 10);
              if (Number.isFinite(n)) updateElement(id, { atomicNumber: n });
            }}
            className="w-[58%] h-9 px-3 text-sm border border-border rounded-lg bg-transparent"
          />
        )}
      </div>

      <div className="text-sm font-medium mt-2 mb-1">Authors</div>
      <div className="pl-3">
        {element.authors.map((author, i) => (
          <div key={i} className="flex items-center gap-1 mb-1">
            <input
              value={author}
              onChange={e => setAuthor(i, e.target.value)}
              className="flex-1 h-8 px-2 text-sm border border-border rounded bg-transparent"
            />
            <button
              className="h-8 w-8 flex items-center justify-center rounded hover:bg-white/10"
              onClick={() => updateElement(id, { authors: element.authors.filter((_, j) => j !== i) })}
            >
              <Minus size={14} />
            </button>
          </div>
        ))}
        <button
          className="h-8 w-8 flex items-center justify-center rounded hover:bg-white/10"
          onClick={() => updateElement(id, { authors: [...element.authors, ''] })}
        >
          <Plus size={14} />
        </button>
      </div>

      <button
        className="mt-3 flex items-center gap-1 px-3 h-8 rounded bg-red-800 hover:bg-red-600 active:bg-red-900 text-white text-sm"
        onClick={() => removeElement(id)}
      >
        <Trash2 size={14} /> Remove
      </button>
    </div>
  );
}
