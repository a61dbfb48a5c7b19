export { DailyHarvester, type HarvesterDeps, type RangeHarvestResult } from "./harvester";
