import type { Request, Response } from "express"
import {
  HTTP_STATUS,
  createTranslationSchema,
  translationExportQuerySchema,
  translationIdSchema,
  translationSearchQuerySchema,
  updateTranslationSchema,
  type ApiResponse,
  type TranslationFilter,
} from "@catalog/shared"
import type { TranslationService } from "../services/translation.service"
import { parseRequest } from "../middleware/validation.middleware"

function sendSuccess<T>(res: Response, data: T, statusCode: number = HTTP_STATUS.OK): void {
  const body: ApiResponse<T> = { success: true, data }
  res.status(statusCode).json(body)
}

export class TranslationController {
  constructor(private readonly translations: TranslationService) {}

  /**
   * GET /translations and GET /search/translations
   */
  list = async (req: Request, res: Response): Promise<void> => {
    const query = parseRequest(translationSearchQuerySchema, req.query, "query")
    const filter: TranslationFilter = {
      key: query.key,
      value: query.value ?? query.content,
      locale: query.locale,
      tags: query.tags,
    }

    const result = await this.translations.search(filter, {
      page: query.page,
      limit: query.per_page,
      sort: query.sort ? { field: query.sort, direction: query.order ?? "asc" } : undefined,
    })

    res.status(HTTP_STATUS.OK).json({ success: true, data: result.data, pagination: result.pagination })
  }

  show = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseRequest(translationIdSchema, req.params, "params")
    sendSuccess(res, await this.translations.findById(id))
  }

  create = async (req: Request, res: Response): Promise<void> => {
    const body = parseRequest(createTranslationSchema, req.body, "body")
    sendSuccess(res, await this.translations.create(body), HTTP_STATUS.CREATED)
  }

  update = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseRequest(translationIdSchema, req.params, "params")
    const { tags, ...fields } = parseRequest(updateTranslationSchema, req.body, "body")
    sendSuccess(res, await this.translations.update(id, fields, tags))
  }

  destroy = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseRequest(translationIdSchema, req.params, "params")
    await this.translations.delete(id)
    sendSuccess(res, { message: "Translation deleted successfully" })
  }

  export = async (req: Request, res: Response): Promise<void> => {
    const { locale, tags } = parseRequest(translationExportQuerySchema, req.query, "query")
    sendSuccess(res, await this.translations.export(locale, tags))
  }

  locales = async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, await this.translations.getAvailableLocales())
  }

  tags = async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, await this.translations.getAvailableTags())
  }
}
