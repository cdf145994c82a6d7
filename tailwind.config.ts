import type { Config } from "tailwindcss";

export default {
  content: ["./client/index.html", "./client/src/**/*.{ts,tsx}"],
  darkMode: "class",
  theme: {
    extend: {
      colors: {
        background: "#1e1e1e",
        surface: "#2c2c2c",
        border: "#444444",
        foreground: "#e0e0e0",
        input: "#444444",
        ring: "#10a37f",
        muted: {
          DEFAULT: "#2c2c2c",
          foreground: "#9a9a9a",
        },
        card: {
          DEFAULT: "#252525",
          foreground: "#e0e0e0",
        },
        accent: {
          DEFAULT: "#333333",
          foreground: "#e0e0e0",
        },
        secondary: {
          DEFAULT: "#3a3a3a",
          foreground: "#e0e0e0",
        },
        primary: {
          DEFAULT: "#10a37f",
          foreground: "#ffffff",
        },
        destructive: {
          DEFAULT: "#ff4444",
          foreground: "#ffffff",
        },
      },
      fontFamily: {
        sans: ["Inter", "system-ui", "-apple-system", "Segoe UI", "sans-serif"],
      },
    },
  },
  plugins: [],
} satisfies Config;
