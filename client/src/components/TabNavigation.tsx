import { Link, useLocation } from "wouter";
import { cn } from "@/lib/utils";

export interface TabItem {
  id: string;
  label: string;
  path: string;
}

interface TabNavigationProps {
  tabs: TabItem[];
}

export default function TabNavigation({ tabs }: TabNavigationProps) {
  const [location] = useLocation();

  return (
    <nav className="flex gap-1">
      {tabs.map((tab) => {
        const isActive = location === tab.path;
        return (
          <Link
            key={tab.id}
            href={tab.path}
            data-testid={`tab-${tab.id}`}
            className={cn(
              "px-4 py-2 text-sm font-medium transition-colors relative",
              isActive ? "text-foreground" : "text-muted-foreground hover:text-foreground",
            )}
          >
            {tab.label}
            {isActive && (
              <div className="absolute bottom-0 left-0 right-0 h-0.5 bg-primary" />
            )}
          </Link>
        );
      })}
    </nav>
  );
}
