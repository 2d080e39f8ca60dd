import { z } from "zod";
import { CurrentWeatherSchema } from "../schemas/openWeather.schema";

export type CurrentWeatherResponse = z.infer<typeof CurrentWeatherSchema>;
