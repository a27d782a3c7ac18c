export * from "./models/common";
export * from "./models/schedule";
export * from "./models/delay";
export * from "./models/crowd";
export * from "./models/trainStatus";
export * from "./models/system";
export * from "./api/types";
export * from "./api/endpoints";
