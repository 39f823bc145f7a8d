"use client";

import { useState } from "react";
import { Info, Lightbulb } from "lucide-react";

type HintVariant = "info" | "tip";

const VARIANT_STYLES: Record<HintVariant, { icon: React.ReactNode; border: string; titleColor: string; trigger: string }> = {
  info: {
    icon: <Info size={12} />,
    border: "border-blue-500/30",
    titleColor: "text-blue-400",
    trigger: "text-blue-500/60 hover:text-blue-400 hover:bg-blue-500/10",
  },
  tip: {
    icon: <Lightbulb size={12} />,
    border: "border-green-500/30",
    titleColor: "text-green-400",
    trigger: "text-green-500/60 hover:text-green-400 hover:bg-green-500/10",
  },
};

interface InfoTooltipProps {
  title: string;
  content: React.ReactNode;
  variant?: HintVariant;
}

export default function InfoTooltip({ title, content, variant = "info" }: InfoTooltipProps) {
  const [isOpen, setIsOpen] = useState(false);
  const style = VARIANT_STYLES[variant];

  return (
    <span className="relative inline-flex items-center">
      <button
        onMouseEnter={() => setIsOpen(true)}
        onMouseLeave={() => setIsOpen(false)}
        onFocus={() => setIsOpen(true)}
        onBlur={() => setIsOpen(false)}
        className={`inline-flex items-center justify-center w-4 h-4 rounded-full transition-all ${style.trigger}`}
      >
        {style.icon}
      </button>
      {isOpen && (
        <div
          className={`absolute z-50 bottom-full left-1/2 -translate-x-1/2 mb-2 w-64 rounded-lg border ${style.border} bg-zinc-950 shadow-xl shadow-black/50 p-3`}
        >
          <div className={`text-xs font-semibold ${style.titleColor} mb-1.5`}>{title}</div>
          <div className="text-[11px] text-zinc-400 leading-relaxed">{content}</div>
        </div>
      )}
    </span>
  );
}

export function InfoBanner({ title, children, variant = "info" }: { title: string; children: React.ReactNode; variant?: HintVariant }) {
  const style = VARIANT_STYLES[variant];
  return (
    <div className={`rounded-lg border ${style.border} bg-zinc-950 px-3 py-2`}>
      <div className={`flex items-center gap-2 text-xs font-semibold ${style.titleColor} mb-1`}>
        {style.icon}
        {title}
      </div>
      <div className="text-[11px] text-zinc-400 leading-relaxed">{children}</div>
    </div>
  );
}
