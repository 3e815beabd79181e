"use client";

import { useState, type ReactNode } from "react";
import Link from "next/link";
import { usePathname } from "next/navigation";
import { ChevronLeft, ChevronRight, Cat, Image as ImageIcon, Info, List, MessageCircleQuestion, History } from "lucide-react";
import { cn } from "@/lib/utils";

const navigation = [
  { name: "Ask AI", href: "/", icon: MessageCircleQuestion },
  { name: "History", href: "/history", icon: History },
  { name: "Preset Questions", href: "/presets", icon: List },
  { name: "Image Generator", href: "/image", icon: ImageIcon },
  { name: "Chillspace for the Bored", href: "/chillspace", icon: Cat },
  { name: "Credits", href: "/credits", icon: Info },
];

export function Sidebar({ children }: { children?: ReactNode }) {
  const pathname = usePathname();
  const [isCollapsed, setIsCollapsed] = useState(false);

  return (
    <aside
      className={cn(
        "flex flex-col h-screen sticky top-0 border-r border-zinc-300/40 bg-zinc-500/5 transition-all duration-300",
        isCollapsed ? "w-16" : "w-72"
      )}
    >
      <nav className="px-2 py-4 space-y-1">
        {navigation.map((item) => {
          const isActive = item.href === "/" ? pathname === "/" : pathname.startsWith(item.href);
          const Icon = item.icon;

          return (
            <Link
              key={item.href}
              href={item.href}
              className={cn(
                "flex items-center gap-3 px-3 py-2 rounded-lg transition-colors hover:bg-zinc-500/10",
                isActive ? "bg-zinc-500/15 font-medium" : "opacity-75",
                isCollapsed && "justify-center"
              )}
              title={isCollapsed ? item.name : undefined}
            >
              <Icon className="w-5 h-5 shrink-0" />
              {!isCollapsed && <span className="text-sm">{item.name}</span>}
            </Link>
          );
        })}
      </nav>

      {/* Page-specific settings */}
      {!isCollapsed && children && (
        <div className="flex-1 overflow-y-auto px-4 py-4 border-t border-zinc-300/40">{children}</div>
      )}
      {(isCollapsed || !children) && <div className="flex-1" />}

      <button
        onClick={() => setIsCollapsed(!isCollapsed)}
        className={cn(
          "flex items-center gap-3 px-3 py-4 border-t border-zinc-300/40 hover:bg-zinc-500/10 transition-colors opacity-75",
          isCollapsed && "justify-center"
        )}
      >
        {isCollapsed ? (
          <ChevronRight className="w-5 h-5" />
        ) : (
          <>
            <ChevronLeft className="w-5 h-5" />
            <span className="text-sm">Collapse</span>
          </>
        )}
      </button>
    </aside>
  );
}
