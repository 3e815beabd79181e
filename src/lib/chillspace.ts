import type { ResolveResult } from "@/lib/types";

// Flight paths for the Chillspace cat, as percentages of the play area.

export interface FlightPath {
  left: string[];
  top: string[];
  rotate: number[];
}

export const FLIGHT_PATH_NAMES = ["fly1", "fly2", "fly3", "fly4"] as const;

export type FlightPathName = (typeof FLIGHT_PATH_NAMES)[number];

export const FLIGHT_PATHS: Record<FlightPathName, FlightPath> = {
  fly1: {
    left: ["0%", "75%", "25%", "80%", "0%"],
    top: ["10%", "20%", "70%", "40%", "10%"],
    rotate: [0, 90, 180, 270, 360],
  },
  fly2: {
    left: ["10%", "80%", "20%", "90%", "10%"],
    top: ["0%", "75%", "25%", "80%", "0%"],
    rotate: [0, -90, -180, -270, -360],
  },
  fly3: {
    left: ["50%", "0%", "50%", "100%", "50%"],
    top: ["0%", "50%", "100%", "50%", "0%"],
    rotate: [45, 135, 225, 315, 405],
  },
  fly4: {
    left: ["0%", "50%", "100%", "50%", "0%"],
    top: ["50%", "0%", "50%", "100%", "50%"],
    rotate: [180, 90, 0, -90, 180],
  },
};

export interface Flyer {
  name: string;
  src: string;
}

export const CATS = [
  { name: "Nyan Cat", src: "https://static.wikia.nocookie.net/nyancat/images/4/44/Glitchynyancatgif.gif/revision/latest/scale-to-width-down/250?cb=20210323054747" },
  { name: "OHHH MY GODDD", src: "https://media.tenor.com/vkYnJE2Jdj8AAAAe/oh-my-god.png" },
  { name: "YAAI", src: "https://static.wikia.nocookie.net/find-the-yaais/images/5/55/YAAI.png/revision/latest?cb=20240731032833" },
] as const;

/** Uniformly random path; may repeat the current one, like a fresh roll. */
export function randomFlightPath(random: () => number = Math.random): FlightPathName {
  const index = Math.min(FLIGHT_PATH_NAMES.length - 1, Math.floor(random() * FLIGHT_PATH_NAMES.length));
  return FLIGHT_PATH_NAMES[index];
}

export const FLYER_WARNING = "Please describe the character you want to generate.";
export const FLYER_SUCCESS = "Character generated! It's now flying.";

// Generated image URL becomes the flyer; errors pass through untouched
export function generatedFlyer(description: string, result: ResolveResult<string>): ResolveResult<Flyer> {
  if (!result.ok) return result;
  return { ok: true, value: { name: description.trim(), src: result.value } };
}
