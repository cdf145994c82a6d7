import type { ModelOption } from "@/hooks/useModels";
import { cn } from "@/lib/utils";

interface ModelSelectProps {
  id: string;
  value: string;
  options: ModelOption[];
  onChange: (value: string) => void;
  disabled?: boolean;
  className?: string;
}

export default function ModelSelect({ id, value, options, onChange, disabled, className }: ModelSelectProps) {
  return (
    <select
      id={id}
      value={value}
      disabled={disabled}
      onChange={(e) => onChange(e.target.value)}
      data-testid={`select-${id}`}
      className={cn(
        "h-9 rounded-md border border-input bg-surface px-3 text-sm focus-visible:outline-none focus-visible:ring-1 focus-visible:ring-ring",
        className,
      )}
    >
      {options.map((option) => (
        <option key={option.id} value={option.id}>
          {option.label}
        </option>
      ))}
    </select>
  );
}
