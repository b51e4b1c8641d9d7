import { Request, Router } from 'express';
import { CityWeather } from '../interfaces/cityWeather';
import { CityService } from '../modules/cities';
import { CityLookup } from '../modules/cityLookup';
import { UserService } from '../modules/users';
import { WeatherService } from '../modules/weather';
import { AddCityFormSchema, formErrors } from '../schemas/forms.schema';
import { AsyncRequestHandler, asyncHandler } from '../middleware/asyncHandler';
import { LOGIN_PATH, requireAuth } from '../middleware/auth';
import { verifyCsrf } from '../middleware/csrf';
import { flash } from '../middleware/flash';
import { renderPage } from '../middleware/render';
import { logger } from '../logger';
import { DASHBOARD_PATH } from './auth';

export interface CityRouteDeps {
  users: Pick<UserService, 'findById'>;
  cities: Pick<CityService, 'listCityIds' | 'addCity' | 'removeCity'>;
  weather: Pick<WeatherService, 'getData' | 'getWeather'>;
  lookup: CityLookup;
}

function currentUserId(req: Request): number | null {
  return req.currentUser?.id ?? null;
}

export function createCityHandlers({ cities, weather, lookup }: Omit<CityRouteDeps, 'users'>) {
  const addCity: AsyncRequestHandler = async (req, res) => {
    const userId = currentUserId(req);
    if (userId === null) {
      res.redirect(LOGIN_PATH);
      return;
    }

    const parsed = AddCityFormSchema.safeParse(req.body);
    if (!parsed.success) {
      formErrors(parsed.error).forEach((message) => flash(req, 'error', message));
      res.redirect(DASHBOARD_PATH);
      return;
    }

    const cityName = parsed.data.city_name;
    const cityId = await lookup(cityName);

    if (cityId === null) {
      flash(req, 'error', `Could not find a city named '${cityName}'.`);
      res.redirect(DASHBOARD_PATH);
      return;
    }

    const outcome = await cities.addCity(userId, cityId);
    if (outcome === 'exists') {
      flash(req, 'warning', `${cityName} is already in your list.`);
    } else {
      logger.info({ userId, cityId }, 'City added');
      flash(req, 'success', `Added ${cityName} to your dashboard.`);
    }

    res.redirect(DASHBOARD_PATH);
  };

  const deleteCity: AsyncRequestHandler = async (req, res) => {
    const userId = currentUserId(req);
    if (userId === null) {
      res.redirect(LOGIN_PATH);
      return;
    }

    const cityId = Number(req.params.cityId);
    const removed = await cities.removeCity(userId, cityId);

    if (removed) {
      logger.info({ userId, cityId }, 'City removed');
      flash(req, 'success', 'City removed.');
    } else {
      flash(req, 'error', 'City not found or you do not have permission to remove it.');
    }

    res.redirect(DASHBOARD_PATH);
  };

  const dashboard: AsyncRequestHandler = async (req, res) => {
    const userId = currentUserId(req);
    if (userId === null) {
      res.redirect(LOGIN_PATH);
      return;
    }

    const cityIds = await cities.listCityIds(userId);
    const cards: Readonly<CityWeather>[] = [];

    if (cityIds.length === 0) {
      flash(req, 'info', 'Your dashboard is empty. Add a city using the search bar!');
    }

    // One failing city must not hide the others.
    for (const cityId of cityIds) {
      const result = await weather.getData(cityId);
      if (result.status === 'success') {
        cards.push(result.data);
      } else {
        flash(req, 'warning', `Could not fetch weather data for city code ${cityId}.`);
      }
    }

    renderPage(req, res, 'index', { cards });
  };

  const cityDetail: AsyncRequestHandler = async (req, res) => {
    const cityId = Number(req.params.cityId);
    const city = await weather.getWeather(cityId);

    if (!city) {
      flash(req, 'error', `Could not retrieve weather data for city ID ${cityId}.`);
      res.redirect(DASHBOARD_PATH);
      return;
    }

    renderPage(req, res, 'city_detail', { city });
  };

  return { addCity, deleteCity, dashboard, cityDetail };
}

export function createCityRouter(deps: CityRouteDeps): Router {
  const router = Router();
  const handlers = createCityHandlers(deps);
  const authenticated = requireAuth(deps.users);

  router.post('/add_city', authenticated, verifyCsrf, asyncHandler(handlers.addCity));
  router.post('/delete_city/:cityId(\\d+)', authenticated, verifyCsrf, asyncHandler(handlers.deleteCity));
  router.get(DASHBOARD_PATH, authenticated, asyncHandler(handlers.dashboard));
  router.get('/city/:cityId(\\d+)', authenticated, asyncHandler(handlers.cityDetail));

  return router;
}
