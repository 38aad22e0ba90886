import { Router } from "express"
import { API_ENDPOINTS } from "@catalog/shared"
import type { TranslationController } from "../controllers/translation.controller"
import { asyncHandler } from "../middleware/error.middleware"

const { TRANSLATIONS } = API_ENDPOINTS

export function createTranslationRouter(controller: TranslationController): Router {
  const router = Router()

  // Fixed paths first so they are not taken for an :id
  router.get(TRANSLATIONS.EXPORT, asyncHandler(controller.export))
  router.get(TRANSLATIONS.LOCALES, asyncHandler(controller.locales))
  router.get(TRANSLATIONS.TAGS, asyncHandler(controller.tags))
  router.get(TRANSLATIONS.SEARCH, asyncHandler(controller.list))

  router.get(TRANSLATIONS.LIST, asyncHandler(controller.list))
  router.post(TRANSLATIONS.CREATE, asyncHandler(controller.create))
  router.get(TRANSLATIONS.GET(":id"), asyncHandler(controller.show))
  router.put(TRANSLATIONS.UPDATE(":id"), asyncHandler(controller.update))
  router.patch(TRANSLATIONS.UPDATE(":id"), asyncHandler(controller.update))
  router.delete(TRANSLATIONS.DELETE(":id"), asyncHandler(controller.destroy))

  return router
}
