export interface LatLng {
  lat: number;
  lng: number;
}

export type IsoTimestamp = string;

/** Clock string as published in schedule files, e.g. "7:45 PM BST". */
export type ClockString = string;

export type WeatherCondition = "clear" | "cloudy" | "rainy" | "stormy" | "foggy";

export interface ApiSuccess {
  success: true;
  timestamp?: IsoTimestamp;
}

export interface RailwatchErrorResponse {
  success: false;
  error: string;
  timestamp?: IsoTimestamp;
}
